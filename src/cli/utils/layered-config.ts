/**
 * Layered Configuration Utilities
 *
 * 階層化設定システムのコアロジック
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema } from '../../types/config.ts';
import type {
  ConfigLayer,
  ConfigLayerPaths,
  ConfigObject,
  ConfigSourceMap,
  ConfigValue,
  RawConfigFile,
  ReplaceMarker,
  ResetMarker,
  TrackedConfigResult,
} from '../../types/layered-config.ts';
import type { ConfigError } from '../../types/errors.ts';
import { configParseError, configValidationError, configMergeError } from '../../types/errors.ts';
import { createOk, createErr, isErr, type Result } from 'option-t/plain_result';

/**
 * プロジェクト設定ディレクトリ名
 */
export const PROJECT_CONFIG_DIR = '.devflow';

/**
 * 特殊記法の型ガード
 */
function isResetMarker(value: unknown): value is ResetMarker {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$reset' in value &&
    value.$reset === true &&
    Object.keys(value).length === 1
  );
}

function isReplaceMarker(value: unknown): value is ReplaceMarker<ConfigValue> {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$replace' in value &&
    Object.keys(value).length === 1
  );
}

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 階層ごとの設定ファイルパスを解決
 *
 * XDG Base Directory仕様に従い、グローバル設定は~/.config/devflow/に配置
 *
 * @param projectRoot - プロジェクトルート（.devflowディレクトリの親）
 */
export function resolveConfigLayerPaths(projectRoot?: string): ConfigLayerPaths {
  const homeDir = os.homedir();
  const cwd = projectRoot ?? process.cwd();

  const configHome = process.env['XDG_CONFIG_HOME'] || path.join(homeDir, '.config');
  const globalConfigDir = path.join(configHome, 'devflow');

  return {
    global: path.join(globalConfigDir, 'config.json'),
    globalLocal: path.join(globalConfigDir, 'config.local.json'),
    project: path.join(cwd, PROJECT_CONFIG_DIR, 'config.json'),
    projectLocal: path.join(cwd, PROJECT_CONFIG_DIR, 'config.local.json'),
  };
}

/**
 * 階層名から設定ファイルパスを引く
 */
export function layerPathOf(paths: ConfigLayerPaths, layer: ConfigLayer): string {
  const layerPathMap: Record<ConfigLayer, string> = {
    global: paths.global,
    'global-local': paths.globalLocal,
    project: paths.project,
    'project-local': paths.projectLocal,
  };
  return layerPathMap[layer];
}

/**
 * 設定ファイルを読み込む（存在しない場合はdata: null）
 */
export async function readConfigFile(
  layer: ConfigLayer,
  filePath: string,
): Promise<Result<RawConfigFile, ConfigError>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return createOk({ layer, filePath, exists: false, data: null });
    }
    return createErr(configParseError(filePath, error));
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return createErr(configParseError(filePath, error));
  }

  if (!isConfigObject(data)) {
    return createErr(configValidationError('top-level value must be an object', filePath));
  }

  return createOk({ layer, filePath, exists: true, data });
}

/**
 * Deep Merge with special markers support
 *
 * マージ仕様:
 * - オブジェクト: 再帰的にマージ
 * - 配列: 上位階層で完全置換
 * - プリミティブ: 上位階層が優先
 * - $reset: 継承をキャンセル（デフォルト値に戻す）
 * - $replace: 完全置換（マージしない）
 *
 * @param lower - 下位優先度の値
 * @param upper - 上位優先度の値
 */
export function deepMerge(lower: ConfigValue | undefined, upper: ConfigValue | undefined): ConfigValue {
  if (upper === undefined) {
    return lower ?? null;
  }

  if (isResetMarker(upper)) {
    return lower ?? null;
  }

  if (isReplaceMarker(upper)) {
    return upper.$replace;
  }

  if (!isConfigObject(upper)) {
    return upper;
  }

  if (!isConfigObject(lower)) {
    return upper;
  }

  const merged: ConfigObject = { ...lower };

  for (const [key, upperValue] of Object.entries(upper)) {
    // $reset はキーごと取り除き、スキーマのデフォルト値に戻す
    if (isResetMarker(upperValue)) {
      delete merged[key];
      continue;
    }
    merged[key] = deepMerge(merged[key], upperValue);
  }

  return merged;
}

/**
 * 設定の出所を追跡しながらマージ
 *
 * @param files - 下位優先度から上位優先度の順に並んだ設定ファイル
 * @returns マージ結果と出所マップ
 */
function mergeWithTracking(
  files: RawConfigFile[],
): Result<{ merged: ConfigObject; sourceMap: ConfigSourceMap }, ConfigError> {
  const sourceMap: ConfigSourceMap = new Map();
  let merged: ConfigObject = {};

  for (const file of files) {
    if (!file.exists || !file.data) {
      continue;
    }

    const nextMerged = deepMerge(merged, file.data);
    if (!isConfigObject(nextMerged)) {
      return createErr(configMergeError(`${file.filePath} replaced the whole configuration with a non-object`));
    }

    trackSourceChanges(merged, nextMerged, file, sourceMap, '');

    merged = nextMerged;
  }

  return createOk({ merged, sourceMap });
}

/**
 * マージによる変更を追跡し、出所マップを更新
 */
function trackSourceChanges(
  before: ConfigObject,
  after: ConfigObject,
  source: RawConfigFile,
  sourceMap: ConfigSourceMap,
  keyPath: string,
): void {
  for (const key of Object.keys(before)) {
    if (!(key in after)) {
      forgetSources(sourceMap, keyPath ? `${keyPath}.${key}` : key);
    }
  }

  for (const [key, afterValue] of Object.entries(after)) {
    const beforeValue = before[key];
    const nextKeyPath = keyPath ? `${keyPath}.${key}` : key;

    if (afterValue !== beforeValue) {
      if (isConfigObject(afterValue) && isConfigObject(beforeValue)) {
        trackSourceChanges(beforeValue, afterValue, source, sourceMap, nextKeyPath);
      } else if (isConfigObject(afterValue)) {
        // 新しく現れたオブジェクトは葉ごとに記録する
        forgetSources(sourceMap, nextKeyPath);
        trackSourceChanges({}, afterValue, source, sourceMap, nextKeyPath);
      } else {
        sourceMap.set(nextKeyPath, {
          layer: source.layer,
          filePath: source.filePath,
        });
      }
    }
  }
}

/**
 * 取り除かれたキー配下の出所を消す
 */
function forgetSources(sourceMap: ConfigSourceMap, keyPath: string): void {
  for (const key of [...sourceMap.keys()]) {
    if (key === keyPath || key.startsWith(`${keyPath}.`)) {
      sourceMap.delete(key);
    }
  }
}

/**
 * 特殊記法を除去
 *
 * Zodバリデーション前に$reset/$replaceマーカーを除去する
 */
function stripSpecialMarkers(value: ConfigObject): ConfigObject {
  const result: ConfigObject = {};

  for (const [key, val] of Object.entries(value)) {
    if (isResetMarker(val) || isReplaceMarker(val)) {
      continue;
    }

    result[key] = isConfigObject(val) ? stripSpecialMarkers(val) : val;
  }

  return result;
}

/**
 * 階層化設定を読み込む（出所追跡付き）
 *
 * 設定ファイルが1つも存在しない場合もデフォルト値で成功する。
 *
 * @param projectRoot - プロジェクトルート（省略時はprocess.cwd()）
 */
export async function loadTrackedConfig(
  projectRoot?: string,
): Promise<Result<TrackedConfigResult, ConfigError>> {
  const paths = resolveConfigLayerPaths(projectRoot);

  const layers: ConfigLayer[] = ['global', 'global-local', 'project', 'project-local'];
  const files: RawConfigFile[] = [];
  for (const layer of layers) {
    const fileResult = await readConfigFile(layer, layerPathOf(paths, layer));
    if (isErr(fileResult)) {
      return fileResult;
    }
    files.push(fileResult.val);
  }

  const mergeResult = mergeWithTracking(files);
  if (isErr(mergeResult)) {
    return mergeResult;
  }

  const { merged, sourceMap } = mergeResult.val;

  const parsed = ConfigSchema.safeParse(stripSpecialMarkers(merged));
  if (!parsed.success) {
    return createErr(configValidationError(parsed.error.message));
  }

  return createOk({ config: parsed.data, sourceMap });
}

/**
 * 設定値を取得（キーパスで指定）
 *
 * @param config - 設定オブジェクト
 * @param keyPath - キーパス（ドット区切り、例: "branches.baseBranch"）
 * @returns 設定値（存在しない場合はundefined）
 */
export function getConfigValue(config: unknown, keyPath: string): unknown {
  let current: unknown = config;

  for (const part of keyPath.split('.')) {
    if (!part) continue;

    if (!isConfigObject(current)) {
      return undefined;
    }

    current = current[part];
  }

  return current;
}
