/**
 * Tracking File Codec
 *
 * Converts between the on-disk JSON layout (snake_case, comma-separated
 * mount points) and the in-memory TrackingDatabase. Parsed files are
 * validated against schema.json with Ajv; timestamps must be RFC 3339.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';

import { CorruptDatabaseError } from '../core/errors.js';
import trackingSchema from './schema.json' with { type: 'json' };
import {
  TRACKING_FORMAT_VERSION,
  type DetachEvent,
  type Mapping,
  type MappingRecord,
  type TrackingDatabase,
  type TrackingFileRecord,
} from './types.js';

const ajv = new Ajv.default({ allErrors: true, strict: false });
addFormats.default(ajv);

// Compile the schema once
const validate = ajv.compile<TrackingFileRecord>(trackingSchema);

/**
 * Create an empty database with the current format version.
 */
export function createEmptyDatabase(): TrackingDatabase {
  return {
    version: TRACKING_FORMAT_VERSION,
    mappings: new Map(),
    detachHistory: [],
  };
}

/**
 * Split a persisted comma-separated mount point list.
 */
export function decodeMountPoints(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((mp) => mp.trim())
    .filter((mp) => mp.length > 0);
}

/**
 * Join mount points for persistence.
 */
export function encodeMountPoints(mountPoints: readonly string[]): string {
  return mountPoints.join(',');
}

/**
 * Parse and validate the content of a tracking file.
 *
 * @param content - Raw file content
 * @param filePath - Path of the file, for error messages
 * @throws CorruptDatabaseError if the content is not a valid tracking file
 */
export function decodeDatabase(content: string, filePath: string): TrackingDatabase {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CorruptDatabaseError(filePath, `invalid JSON: ${detail}`);
  }

  if (!validate(parsed)) {
    throw new CorruptDatabaseError(filePath, formatSchemaErrors(validate.errors ?? []));
  }

  const mappings = new Map<string, Mapping>();
  for (const [path, record] of Object.entries(parsed.mappings)) {
    mappings.set(path, decodeMapping(path, record));
  }

  const detachHistory: DetachEvent[] = (parsed.detach_history ?? []).map((event) => ({
    path: event.path,
    uuid: event.uuid,
    deviceName: event.dev_name ?? '',
    timestamp: event.timestamp,
  }));

  return {
    version: parsed.version,
    mappings,
    detachHistory,
  };
}

/**
 * Serialize a database to the on-disk JSON layout.
 */
export function encodeDatabase(db: TrackingDatabase): string {
  // fromEntries defines own properties, so keys like __proto__ stay data
  const mappings: Record<string, MappingRecord> = Object.fromEntries(
    [...db.mappings].map(([path, mapping]) => [
      path,
      {
        uuid: mapping.uuid,
        dev_name: mapping.deviceName,
        mount_points: encodeMountPoints(mapping.mountPoints),
        last_attached: mapping.lastAttached,
      },
    ])
  );

  const record: TrackingFileRecord = {
    version: db.version,
    mappings,
    detach_history: db.detachHistory.map((event) => ({
      path: event.path,
      uuid: event.uuid,
      dev_name: event.deviceName,
      timestamp: event.timestamp,
    })),
  };

  return `${JSON.stringify(record, null, 2)}\n`;
}

function decodeMapping(path: string, record: MappingRecord): Mapping {
  return {
    path,
    uuid: record.uuid,
    deviceName: record.dev_name ?? '',
    mountPoints: decodeMountPoints(record.mount_points),
    lastAttached: record.last_attached ?? '',
  };
}

function formatSchemaErrors(errors: ErrorObject[]): string {
  if (errors.length === 0) {
    return 'schema validation failed';
  }
  return errors
    .map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`)
    .join('; ');
}
