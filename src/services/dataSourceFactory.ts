import type { DataSource } from '../types';
import { DonkiService } from './donki';

export function createDataSource(): DataSource {
    return new DonkiService();
}
