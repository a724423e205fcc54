import type { Config } from '../../types/config.ts';
import { isErr } from 'option-t/plain_result';
import { loadTrackedConfig } from './layered-config.ts';

/**
 * 階層化設定を読み込む
 *
 * 設定ファイルが1つもなくてもデフォルト値で動く。
 *
 * @param projectRoot - プロジェクトルート（省略時はカレントディレクトリ）
 */
export async function loadConfig(projectRoot?: string): Promise<Config> {
  const result = await loadTrackedConfig(projectRoot);

  if (isErr(result)) {
    throw new Error(result.err.message);
  }

  return result.val.config;
}
