import { answerHandler, questionFromBody } from '../answer';

const fakeResponse = () => {
  const res = {
    type: jest.fn(),
    send: jest.fn(),
  };
  res.type.mockReturnValue(res);
  res.send.mockReturnValue(res);
  return res;
};

describe('questionFromBody', () => {
  it('reads JSON and plain text bodies', () => {
    expect(questionFromBody({ text: 'Сколько видео?' })).toBe('Сколько видео?');
    expect(questionFromBody('Сколько видео?')).toBe('Сколько видео?');
  });

  it.each([undefined, null, {}, { text: 42 }, ['Сколько видео?']])('treats %p as an empty question', (body) => {
    expect(questionFromBody(body)).toBe('');
  });
});

describe('answerHandler', () => {
  it('replies with the integer as plain text', async () => {
    const answer = jest.fn().mockResolvedValue(320000);
    const res = fakeResponse();

    await answerHandler({ answer })({ body: { text: 'Сколько всего просмотров?' } }, res);

    expect(answer).toHaveBeenCalledWith('Сколько всего просмотров?');
    expect(res.type).toHaveBeenCalledWith('text/plain');
    expect(res.send).toHaveBeenCalledWith('320000');
  });

  it('replies 0 when the service throws', async () => {
    const res = fakeResponse();

    await answerHandler({ answer: jest.fn().mockRejectedValue(new Error('boom')) })({ body: 'x' }, res);

    expect(res.send).toHaveBeenCalledWith('0');
  });
});
