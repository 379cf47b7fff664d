import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { isMissingFileError } from '@kicad-vdiff/utils';

import { WORKING, WORKING_NAME, type VersionId } from '../version-id.js';
import type { CatalogEntry, VersionSource } from '../version-source.js';

/**
 * The project files as they are on disk right now
 */
export class WorkingVersionSource implements VersionSource {
  readonly kind = 'working' as const;

  constructor(readonly projectRoot: string) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async *entries(): AsyncGenerator<CatalogEntry> {
    yield {
      id: WORKING,
      label: `${WORKING_NAME} (working tree)`,
      source: 'working',
      timestamp: null,
    };
  }

  async readFile(id: VersionId, relativePath: string): Promise<Buffer | null> {
    if (id.kind !== 'working') {
      throw new Error(`WorkingVersionSource cannot read ${id.kind} versions`);
    }
    try {
      return await readFile(join(this.projectRoot, ...relativePath.split('/')));
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }
}
