/**
 * 出力の詳細度
 *
 * quiet < normal < verbose < debug
 */
export type Verbosity = 'quiet' | 'normal' | 'verbose' | 'debug';

/**
 * CLI出力のインターフェース
 *
 * コアはこのインターフェースだけに依存し、テストではメモリ実装を使う。
 */
export interface Logger {
  readonly verbosity: Verbosity;
  /** セクション見出し */
  section(title: string): void;
  info(message: string): void;
  /** 補足（normal以上） */
  note(message: string): void;
  success(message: string): void;
  /** 警告は quiet でも表示する */
  warn(message: string): void;
  error(message: string): void;
  /** 実行結果の要約（quiet でも表示する） */
  summary(message: string): void;
  /** --verbose 時のみ */
  verbose(message: string): void;
  /** --debug 時のみ */
  debug(message: string): void;
}
