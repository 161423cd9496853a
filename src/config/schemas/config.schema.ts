import { z } from 'zod';

/**
 * A list given either as a YAML sequence or a comma-separated string
 */
const ListSchema = z
  .union([z.string(), z.array(z.union([z.string(), z.number()]))])
  .transform((value) =>
    (Array.isArray(value) ? value.map(String) : value.split(',')).map((item) => item.trim())
  );

const BooleanSchema = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase())),
]);

const PositiveIntSchema = z.coerce.number().int().positive();

const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'Must be an http(s) URL' });

// =============================================================================
// Raw settings: what a YAML file or the environment may provide
// =============================================================================

export const PiholeSettingsSchema = z.object({
  alias: ListSchema.default('pihole'),
  address: ListSchema.default('http://pi.hole:80'),
  password: ListSchema.optional(),
  apiVersion: z.enum(['v6', 'legacy']).default('v6'),
  numTopItems: PositiveIntSchema.default(10),
  numTopClients: PositiveIntSchema.default(10),
  verifySsl: BooleanSchema.default(true),
});

export const InfluxDBConfigSchema = z.object({
  address: HttpUrlSchema.default('http://influxdb:8086'),
  org: z.string().min(1).default('my-org'),
  bucket: z.string().min(1).default('pihole'),
  token: z
    .string({ required_error: 'No InfluxDB auth token provided' })
    .min(1, 'No InfluxDB auth token provided'),
  createBucket: BooleanSchema.default(false),
  verifySsl: BooleanSchema.default(true),
});

export const ExporterSettingsSchema = z.object({
  intervalSeconds: PositiveIntSchema.default(60),
  pihole: PiholeSettingsSchema.default({}),
  influxdb: InfluxDBConfigSchema,
});

export type PiholeSettings = z.infer<typeof PiholeSettingsSchema>;
export type InfluxDBConfig = z.infer<typeof InfluxDBConfigSchema>;
export type ExporterSettings = z.infer<typeof ExporterSettingsSchema>;
