import { fileURLToPath } from 'node:url';
import path from 'node:path';

/** `data/` at the package root, both from `src/utils` and `dist/utils`. */
const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

/**
 * Absolute path of a bundled data file, e.g. `dataPath('lemmas', 'de.json')`.
 */
export function dataPath(...segments: string[]): string {
    return path.join(DATA_DIR, ...segments);
}
