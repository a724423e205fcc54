import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * package.json からバージョンを取得する
 */
export function getVersion(): string {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const projectRoot = join(dirname(currentFile), '..', '..', '..');
    const packageJson: unknown = JSON.parse(readFileSync(join(projectRoot, 'package.json'), 'utf-8'));
    return PackageJsonSchema.parse(packageJson).version;
  } catch {
    // package.jsonの読み取りに失敗した場合のフォールバック
    return '0.0.0-dev';
  }
}
