import type { Measurement } from '@usl/domain';

export interface MeasurementSourcePort {
  describe(): string;
  load(): Promise<Measurement[]>;
}
