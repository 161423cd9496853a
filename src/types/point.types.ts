/**
 * Time-series point types
 */

export type NumericFieldType = 'uint' | 'int' | 'float';

export type FieldValue =
  | { type: NumericFieldType; value: number }
  | { type: 'string'; value: string };

export interface PointTags {
  alias: string;
  hostname: string;
}

export interface DataPoint {
  measurement: string;
  tags: PointTags;
  fields: Record<string, FieldValue>;
  /** Epoch seconds */
  timestamp: number;
}

export interface WriteSink {
  ensureBucket(): Promise<boolean>;
  writeBatch(points: DataPoint[]): Promise<boolean>;
  healthCheck(): Promise<boolean>;
}
