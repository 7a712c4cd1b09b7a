import AjvModule from 'ajv';
import fs from 'fs-extra';
import path from 'node:path';
import type { GuildSnapshot } from './types.js';
import { errorMessage } from '../lib/errors.js';

const Ajv = AjvModule.default;

const nullableId = { type: 'string', nullable: true } as const;

const snapshotSchema = {
  type: 'object',
  additionalProperties: {
    type: 'object',
    properties: {
      whitelistChannel: nullableId,
      whitelistRole: nullableId,
      ledgerType: nullableId,
      entries: { type: 'object', additionalProperties: { type: 'string' } },
    },
    required: ['whitelistChannel', 'whitelistRole', 'ledgerType', 'entries'],
    additionalProperties: false,
  },
} as const;

const ajv = new Ajv({ strict: false, allErrors: true });
const validateSnapshot = ajv.compile<GuildSnapshot>(snapshotSchema);

export class SnapshotFormatError extends Error {
  constructor(
    readonly file: string,
    detail: string
  ) {
    super(`Guild snapshot ${file} is malformed: ${detail}`);
    this.name = 'SnapshotFormatError';
  }
}

/** Resolves to null when no snapshot has been written yet. */
export async function readSnapshot(file: string): Promise<GuildSnapshot | null> {
  if (!(await fs.pathExists(file))) return null;
  let raw: unknown;
  try {
    raw = await fs.readJSON(file);
  } catch (err) {
    throw new SnapshotFormatError(file, errorMessage(err));
  }
  if (!validateSnapshot(raw)) {
    throw new SnapshotFormatError(file, ajv.errorsText(validateSnapshot.errors));
  }
  return raw;
}

/** Full overwrite: write beside the target, then rename over it. */
export async function writeSnapshot(file: string, snapshot: GuildSnapshot): Promise<void> {
  await fs.ensureDir(path.dirname(file));
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.writeJSON(tmp, snapshot, { spaces: 2 });
  await fs.move(tmp, file, { overwrite: true });
}
