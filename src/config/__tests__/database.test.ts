import { checkDatabaseHealth } from '../database';
import { env } from '../env';
import { logger } from '../logger';

describe('checkDatabaseHealth', () => {
  const target = `${env.database.host}:${env.database.port}/${env.database.name}`;

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads the videos table when connected', async () => {
    const query = jest.fn().mockResolvedValue([]);

    await expect(checkDatabaseHealth({ isInitialized: true, query })).resolves.toBe(true);
    expect(query).toHaveBeenCalledWith('SELECT 1 FROM videos LIMIT 1');
  });

  it('names the database it could not reach', async () => {
    const warn = jest.spyOn(logger, 'warn');
    const query = jest.fn();

    await expect(checkDatabaseHealth({ isInitialized: false, query })).resolves.toBe(false);
    expect(query).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith(`🩺 No connection to ${target} for health check`);
  });

  it('reports a failing query as unhealthy', async () => {
    const error = jest.spyOn(logger, 'error');
    const failure = new Error('relation "videos" does not exist');
    const query = jest.fn().mockRejectedValue(failure);

    await expect(checkDatabaseHealth({ isInitialized: true, query })).resolves.toBe(false);
    expect(error).toHaveBeenCalledWith(`❌ Health check against ${target} failed:`, failure);
  });
});
