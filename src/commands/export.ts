import fs from 'fs-extra';
import path from 'node:path';

export const CSV_HEADER = 'userId,walletAddress';

function csvCell(value: string) {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function buildEntriesCsv(entries: Record<string, string>): string {
  const rows = Object.entries(entries).map(([userId, address]) => `${csvCell(userId)},${csvCell(address)}`);
  return [CSV_HEADER, ...rows].join('\n') + '\n';
}

export function exportFileName(guildId: string) {
  return `${guildId}.csv`;
}

/**
 * Writes the table into the staging directory and returns its path. The staged
 * name carries the request id so overlapping exports for one guild stay apart.
 */
export async function stageExport(
  dir: string,
  guildId: string,
  requestId: string,
  entries: Record<string, string>
): Promise<string> {
  await fs.ensureDir(dir);
  const target = path.join(dir, `${guildId}-${requestId}.csv`);
  await fs.writeFile(target, buildEntriesCsv(entries), 'utf8');
  return target;
}
