import os from 'node:os';
import path from 'node:path';

/**
 * 表示用のパス
 *
 * cwd 配下は相対パス、ホーム配下は `~/` 始まり、それ以外は絶対パス
 */
export const toDisplayPath = (
  targetPath: string,
  cwd: string = process.cwd(),
  home: string = os.homedir(),
): string => {
  const absolutePath = path.resolve(cwd, targetPath);

  const fromCwd = path.relative(cwd, absolutePath);
  if (fromCwd === '') return '.';
  if (!fromCwd.startsWith('..') && !path.isAbsolute(fromCwd)) return fromCwd;

  const fromHome = path.relative(home, absolutePath);
  if (fromHome !== '' && !fromHome.startsWith('..') && !path.isAbsolute(fromHome)) {
    return `~/${fromHome}`;
  }

  return absolutePath;
};
