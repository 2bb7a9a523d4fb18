/**
 * Filesystem Helpers
 */

import fs from 'fs';

export async function pathExists(file: string): Promise<boolean> {
  return fs.promises.access(file).then(
    () => true,
    () => false
  );
}
