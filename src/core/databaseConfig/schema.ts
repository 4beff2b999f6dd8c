import { z } from 'zod/v4';

/**
 * Zod schema for a single environment's settings.
 * Every key is kept; the analyzers inspect only the ones they know.
 */
export const configRecordSchema = z.record(z.string(), z.unknown());

/**
 * Zod schema for the whole database.yml document.
 * Top-level keys are environment names (and YAML anchors such as `default`).
 */
export const databaseConfigSchema = z.record(z.string(), z.unknown());

/** Settings of one environment. */
export type ConfigRecord = z.infer<typeof configRecordSchema>;

/** Environments the configuration analyzers inspect, in report order. */
export const ENVIRONMENTS: readonly string[] = ['development', 'test', 'production'];
