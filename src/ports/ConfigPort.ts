import type { RecorderConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<RecorderConfig>;
}

export type { RecorderConfig };
