/**
 * Line codec for the interchange format:
 *
 *   {"<id>": {"annotated": true, "uid": "alice", "score": 1, "<field>": ..., "chk_<field>": false}}
 */
import { deriveQualityScore, isQualityScore, type AnnotationRecord, type FieldValue } from '../../core/models';
import { isFieldValue } from './field-transform.utils';

export const FLAG_PREFIX = 'chk_';

const META_KEYS = new Set(['annotated', 'uid', 'score', 'created_at', 'updated_at']);

/**
 * A record (a file line or a table row) that does not have the expected shape.
 */
export class RecordFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordFormatError';
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function encodeRecordLine(record: AnnotationRecord): string {
  const body: Record<string, FieldValue> = {
    annotated: record.completed,
    uid: record.owner,
    score: record.qualityScore,
    ...record.fields,
  };
  for (const [name, flagged] of Object.entries(record.flags)) {
    body[FLAG_PREFIX + name] = flagged;
  }
  body['created_at'] = record.createdAt;
  body['updated_at'] = record.updatedAt;
  return JSON.stringify({ [record.id]: body });
}

/**
 * Parses one line. Missing metadata gets defaults: unclaimed, not completed,
 * score derived from the flags, timestamps set to `now`.
 */
export function decodeRecordLine(line: string, now: string = new Date().toISOString()): AnnotationRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new RecordFormatError('line is not valid JSON');
  }
  if (!isPlainObject(parsed)) {
    throw new RecordFormatError('line is not a JSON object');
  }
  const entries = Object.entries(parsed);
  if (entries.length !== 1) {
    throw new RecordFormatError(`expected exactly one record per line, found ${entries.length}`);
  }

  const [[id, body]] = entries;
  if (!isPlainObject(body)) {
    throw new RecordFormatError(`record "${id}" is not a JSON object`);
  }

  const fields: Record<string, FieldValue> = {};
  const flags: Record<string, boolean> = {};
  for (const [key, value] of Object.entries(body)) {
    if (META_KEYS.has(key)) continue;
    if (key.startsWith(FLAG_PREFIX)) {
      flags[key.slice(FLAG_PREFIX.length)] = value === true;
      continue;
    }
    if (!isFieldValue(value)) {
      throw new RecordFormatError(`record "${id}" field "${key}" is not a JSON value`);
    }
    fields[key] = value;
  }

  const score = body['score'];
  return {
    id,
    owner: typeof body['uid'] === 'string' ? body['uid'] : '',
    completed: body['annotated'] === true,
    qualityScore: isQualityScore(score) ? score : deriveQualityScore(flags),
    fields,
    flags,
    createdAt: typeof body['created_at'] === 'string' ? body['created_at'] : now,
    updatedAt: typeof body['updated_at'] === 'string' ? body['updated_at'] : now,
  };
}

/**
 * Parses a whole file. Blank lines are skipped; a malformed line fails the
 * whole parse with its 1-based line number.
 */
export function decodeRecordFile(content: string, now: string = new Date().toISOString()): Map<string, AnnotationRecord> {
  const records = new Map<string, AnnotationRecord>();
  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') return;
    try {
      const record = decodeRecordLine(line, now);
      if (records.has(record.id)) {
        throw new RecordFormatError(`duplicate record id "${record.id}"`);
      }
      records.set(record.id, record);
    } catch (error) {
      if (error instanceof RecordFormatError) {
        throw new RecordFormatError(`line ${index + 1}: ${error.message}`);
      }
      throw error;
    }
  });
  return records;
}

export function encodeRecordFile(records: Iterable<AnnotationRecord>): string {
  const lines: string[] = [];
  for (const record of records) {
    lines.push(encodeRecordLine(record));
  }
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}
