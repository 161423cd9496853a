import { InfluxDB, Point, HttpError } from '@influxdata/influxdb-client';
import { BucketsAPI, HealthAPI, OrgsAPI } from '@influxdata/influxdb-client-apis';
import { createLogger } from '../../core/Logger';
import type { DataPoint, WriteSink } from '../../types/point.types';
import type { InfluxDBConfig } from '../../config/schemas/config.schema';

/** Retention applied to a bucket created by the exporter */
export const BUCKET_RETENTION_SECONDS = 604800; // 7 days

/**
 * InfluxDB 2.x write sink.
 * Each batch gets its own write API so one instance's cycle never flushes or
 * fails another's points.
 */
export class InfluxDB2Sink implements WriteSink {
  private readonly client: InfluxDB;
  private readonly logger = createLogger('InfluxDB2Sink');

  constructor(private readonly config: InfluxDBConfig) {
    this.client = new InfluxDB({
      url: config.address,
      token: config.token,
      transportOptions: {
        rejectUnauthorized: config.verifySsl,
      },
    });
  }

  /**
   * Make sure the target bucket exists, creating it when allowed
   */
  async ensureBucket(): Promise<boolean> {
    const { bucket, org, createBucket } = this.config;

    try {
      if (await this.bucketExists()) {
        this.logger.debug(`Bucket ${bucket} found`);
        return true;
      }

      if (!createBucket) {
        this.logger.error(`InfluxDB bucket ${bucket} does not exist`);
        return false;
      }

      this.logger.info(`InfluxDB bucket ${bucket} does not yet exist - creating...`);
      const orgID = await this.findOrgId();
      if (!orgID) {
        this.logger.error(`InfluxDB organization ${org} not found`);
        return false;
      }

      await new BucketsAPI(this.client).postBuckets({
        body: {
          orgID,
          name: bucket,
          retentionRules: [{ type: 'expire', everySeconds: BUCKET_RETENTION_SECONDS }],
        },
      });
      this.logger.info(`Created InfluxDB bucket ${bucket}`);
      return true;
    } catch (error) {
      this.logger.error(`Error verifying InfluxDB bucket: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Write one instance's points for one cycle as a single batch
   */
  async writeBatch(points: DataPoint[]): Promise<boolean> {
    if (points.length === 0) {
      return true;
    }

    const writeApi = this.client.getWriteApi(this.config.org, this.config.bucket, 's', {
      batchSize: points.length + 1,
      flushInterval: 0,
      maxRetries: 0,
    });

    try {
      const encoded = this.encodePoints(points);
      writeApi.writePoints(encoded);
      await writeApi.flush();
      this.logger.debug(`Wrote ${encoded.length} points to InfluxDB 2.x`);
      return true;
    } catch (error) {
      this.logger.error(`Error writing data to InfluxDB: ${describeError(error)}`);
      return false;
    } finally {
      await writeApi.close().catch((error: unknown) => {
        this.logger.warn(`Error closing InfluxDB write API: ${describeError(error)}`);
      });
    }
  }

  /**
   * Check if InfluxDB is healthy
   */
  async healthCheck(): Promise<boolean> {
    try {
      const health = await new HealthAPI(this.client).getHealth();
      return health.status === 'pass';
    } catch (error) {
      this.logger.debug(`InfluxDB health check failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Convert points one by one; a point the client rejects is skipped
   */
  private encodePoints(points: DataPoint[]): Point[] {
    const encoded: Point[] = [];
    for (const dataPoint of points) {
      try {
        encoded.push(toInfluxPoint(dataPoint));
      } catch (error) {
        this.logger.warn(
          `[${dataPoint.tags.alias}] Skipping ${dataPoint.measurement} point: ${describeError(error)}`
        );
      }
    }
    return encoded;
  }

  private async bucketExists(): Promise<boolean> {
    try {
      const { buckets } = await new BucketsAPI(this.client).getBuckets({
        name: this.config.bucket,
        org: this.config.org,
      });
      return (buckets ?? []).some((found) => found.name === this.config.bucket);
    } catch (error) {
      if (error instanceof HttpError && error.statusCode === 404) {
        return false;
      }
      throw error;
    }
  }

  private async findOrgId(): Promise<string | undefined> {
    const { orgs } = await new OrgsAPI(this.client).getOrgs({ org: this.config.org });
    return orgs?.find((found) => found.name === this.config.org)?.id;
  }
}

/**
 * Convert a DataPoint to an InfluxDB Point, honouring each field's declared type
 */
export function toInfluxPoint(dataPoint: DataPoint): Point {
  const point = new Point(dataPoint.measurement)
    .tag('alias', dataPoint.tags.alias)
    .tag('hostname', dataPoint.tags.hostname);

  for (const [name, field] of Object.entries(dataPoint.fields)) {
    switch (field.type) {
      case 'uint':
        point.uintField(name, field.value);
        break;
      case 'int':
        point.intField(name, field.value);
        break;
      case 'float':
        point.floatField(name, field.value);
        break;
      case 'string':
        point.stringField(name, field.value);
        break;
    }
  }

  return point.timestamp(dataPoint.timestamp);
}

function describeError(error: unknown): string {
  if (error instanceof HttpError) {
    return `${error.statusCode} - ${error.message}`;
  }
  return error instanceof Error ? error.message : 'Unknown error';
}
