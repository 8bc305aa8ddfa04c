/**
 * Import a legacy plain-text list of processed ids (one per line).
 *
 * Goes through Ledger.mark(), so running it twice imports nothing the second
 * time.
 */

import fs from 'fs';

import type { Ledger } from './ledger.js';

export interface MigrationResult {
  imported: number;
  alreadyPresent: number;
}

export async function migrateLegacyList(ledger: Ledger, filePath: string): Promise<MigrationResult> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  const ids = content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const result: MigrationResult = { imported: 0, alreadyPresent: 0 };
  for (const id of ids) {
    if (ledger.contains(id)) {
      result.alreadyPresent++;
      continue;
    }
    await ledger.mark(id);
    result.imported++;
  }

  console.error(
    `[Ledger] Migrated ${result.imported} id(s) from ${filePath} (${result.alreadyPresent} already present)`
  );
  return result;
}
