/**
 * YAML Output Utilities
 *
 * Every command with a `--yaml` flag writes exactly one YAML document to
 * stdout, framed by `---` separators, so scripts can parse it while
 * diagnostics go to stderr.
 */

import { stringify as stringifyYaml } from 'yaml';

/**
 * Plain-data copy of a result: dates become ISO strings, undefined fields vanish
 */
export function toYamlData(result: unknown): unknown {
  return JSON.parse(JSON.stringify(result));
}

/**
 * Output a result as YAML to stdout and wait for it to flush
 *
 * @example
 * ```typescript
 * await outputYamlResult({ success: true, versions });
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  // Let pending stderr output go first
  await new Promise(resolve => setTimeout(resolve, 10));

  const yaml = stringifyYaml(toYamlData(result));
  process.stdout.write('---\n');
  process.stdout.write(yaml.endsWith('\n') ? yaml : `${yaml}\n`);
  process.stdout.write('---\n');

  await new Promise<void>(resolve => {
    if (process.stdout.write('')) {
      resolve();
    } else {
      process.stdout.once('drain', resolve);
    }
  });
}
