import { once } from 'node:events';
import readline from 'node:readline/promises';
import type { PromptEffects } from '../../types/prompt.ts';

/**
 * 回答文字列を真偽値に解釈する
 *
 * @returns 解釈できなければ null
 */
export function parseYesNo(answer: string, defaultValue: boolean): boolean | null {
  const trimmed = answer.trim().toLowerCase();

  if (trimmed === '') {
    return defaultValue;
  }
  if (trimmed === 'y' || trimmed === 'yes') {
    return true;
  }
  if (trimmed === 'n' || trimmed === 'no') {
    return false;
  }
  return null;
}

export type PromptStreams = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

/**
 * yes/no の確認プロンプト
 *
 * 入力が閉じられた場合（パイプ、`< /dev/null` など）は拒否として扱う。
 *
 * @param question 質問文
 * @param defaultValue 空入力時の値
 */
export async function promptYesNo(
  question: string,
  defaultValue: boolean,
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Promise<boolean> {
  const rl = readline.createInterface({
    input: streams.input,
    output: streams.output,
  });

  let isClosed = false;
  const closed = once(rl, 'close').then(() => {
    isClosed = true;
    return null;
  });

  const hint = defaultValue ? '(Y/n)' : '(y/N)';

  try {
    while (!isClosed) {
      const answer = await Promise.race([closed, rl.question(`${question} ${hint}: `)]);
      if (answer === null) {
        break;
      }

      const parsed = parseYesNo(answer, defaultValue);
      if (parsed !== null) {
        return parsed;
      }

      streams.output.write('Invalid input. Please enter "y" or "n".\n');
    }
    streams.output.write('\n');
    return false;
  } finally {
    if (!isClosed) {
      rl.close();
    }
  }
}

export function createReadlinePromptEffects(streams?: PromptStreams): PromptEffects {
  return {
    confirm: (question, defaultValue) => promptYesNo(question, defaultValue, streams),
  };
}
