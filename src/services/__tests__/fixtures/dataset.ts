import videos from './videos.json';
import { Dataset } from '../../../types/dataset';
import { parseDataset } from '../../dataset/datasetFile';

/** Five videos around 2025-11-01..05 with boundary publish instants and seven snapshots. */
export const loadFixtureDataset = (): Dataset => parseDataset(videos);
