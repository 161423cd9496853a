export { InfluxDB2Sink, BUCKET_RETENTION_SECONDS, toInfluxPoint } from './InfluxDB2Sink';
