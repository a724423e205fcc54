/**
 * Config command
 *
 * 設定確認コマンド（show, path）
 */

import { Command } from 'commander';
import type { ConfigLayer } from '../../types/layered-config.ts';
import { isErr } from 'option-t/plain_result';
import {
  loadTrackedConfig,
  getConfigValue,
  layerPathOf,
  resolveConfigLayerPaths,
} from '../utils/layered-config.ts';
import { toDisplayPath } from '../utils/display-path.ts';

const LAYERS: readonly ConfigLayer[] = ['global', 'global-local', 'project', 'project-local'];

/**
 * 設定値を人間が読みやすい形式で表示
 */
export function formatConfigValue(value: unknown, indent = 0): string {
  const indentStr = '  '.repeat(indent);

  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'boolean' || typeof value === 'number') {
    return String(value);
  }

  if (typeof value === 'string') {
    return `"${value}"`;
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]';
    }

    const items = value
      .map((item: unknown) => `${indentStr}  - ${formatConfigValue(item, indent + 1)}`)
      .join('\n');
    return `\n${items}`;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    if (entries.length === 0) {
      return '{}';
    }

    const items = entries
      .map(([k, v]) => {
        const formattedValue = formatConfigValue(v, indent + 1);
        if (formattedValue.startsWith('\n')) {
          return `${indentStr}  ${k}:${formattedValue}`;
        }
        return `${indentStr}  ${k}: ${formattedValue}`;
      })
      .join('\n');
    return `\n${items}`;
  }

  return String(value);
}

/**
 * devflow config show [key]
 */
async function showCommand(
  key: string | undefined,
  options: { withSource?: boolean; json?: boolean },
): Promise<void> {
  const result = await loadTrackedConfig();

  if (isErr(result)) {
    console.error(`Error: ${result.err.message}`);
    process.exit(1);
  }

  const { config, sourceMap } = result.val;

  if (key) {
    const value = getConfigValue(config, key);

    if (value === undefined) {
      console.error(`Key not found: ${key}`);
      process.exit(1);
    }

    if (options.json) {
      console.log(JSON.stringify(value, null, 2));
      return;
    }

    console.log(`${key}: ${formatConfigValue(value)}`);
    if (options.withSource) {
      const source = sourceMap.get(key);
      console.log(
        source ? `  (from ${source.layer}: ${toDisplayPath(source.filePath)})` : '  (default)',
      );
    }
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  console.log('Merged configuration:');
  console.log(formatConfigValue(config));

  if (options.withSource) {
    console.log('\n--- Configuration Sources ---');

    const sourcesByLayer = new Map<ConfigLayer, string[]>();
    for (const [k, source] of sourceMap.entries()) {
      const keys = sourcesByLayer.get(source.layer) ?? [];
      keys.push(k);
      sourcesByLayer.set(source.layer, keys);
    }

    for (const layer of LAYERS) {
      const keys = sourcesByLayer.get(layer);
      if (keys && keys.length > 0) {
        console.log(`\n[${layer}]`);
        for (const k of keys) {
          console.log(`  ${k}`);
        }
      }
    }
  }
}

/**
 * devflow config path
 *
 * 各階層の設定ファイルの場所を表示
 */
function pathCommand(): void {
  const paths = resolveConfigLayerPaths();
  for (const layer of LAYERS) {
    console.log(`${layer.padEnd(13)} ${toDisplayPath(layerPathOf(paths, layer))}`);
  }
}

/**
 * config コマンドを作成
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description('Inspect configuration');

  config
    .command('show')
    .description('Show merged configuration')
    .argument('[key]', 'Configuration key (e.g., "branches.baseBranch")')
    .option('--with-source', 'Show configuration sources')
    .option('--json', 'Output as JSON')
    .action(showCommand);

  config.command('path').description('Show configuration file locations').action(pathCommand);

  return config;
}
