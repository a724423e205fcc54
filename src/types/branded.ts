/**
 * Branded Types for type-safe domain identifiers
 *
 * ドメイン識別子の型安全性を確保するためのBranded Types定義。
 * 文字列をそのまま使うのではなく、意味のある型として扱うことで、
 * ブランチ名とリモート名などを誤って混同することを防ぐ。
 */

declare const brand: unique symbol;
type Brand<K, T> = T & { readonly [brand]: K };

// Git/VCS関連
export type RepoPath = Brand<'RepoPath', string>;
export type BranchName = Brand<'BranchName', string>;
export type RemoteName = Brand<'RemoteName', string>;

// コンストラクタ関数
// これらの関数を使って、素のstring型からBranded Typeへ変換する
export const repoPath = (raw: string): RepoPath => raw as RepoPath;
export const branchName = (raw: string): BranchName => raw as BranchName;
export const remoteName = (raw: string): RemoteName => raw as RemoteName;

