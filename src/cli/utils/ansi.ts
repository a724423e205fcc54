/**
 * ANSI 色付けユーティリティ
 */

export const ANSI = {
  RESET: '\x1b[0m',
  BOLD: '\x1b[1m',
  RED: '\x1b[31m',
  GREEN: '\x1b[32m',
  YELLOW: '\x1b[33m',
  CYAN: '\x1b[36m',
  GRAY: '\x1b[90m',
} as const;

/**
 * ANSIが有効かどうかを判定
 *
 * @param stream 出力ストリーム
 * @param env 環境変数
 */
export function isAnsiEnabled(
  stream: { isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return stream.isTTY === true;
}

/**
 * テキストに色を付ける
 */
export function colorize(text: string, color: string, useAnsi: boolean): string {
  if (!useAnsi) {
    return text;
  }
  return `${color}${text}${ANSI.RESET}`;
}
