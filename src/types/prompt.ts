/**
 * 対話確認の副作用インターフェース
 */
export interface PromptEffects {
  /**
   * Yes/No を尋ねる
   *
   * @param question 質問文
   * @param defaultValue 空入力時の値
   */
  confirm(question: string, defaultValue: boolean): Promise<boolean>;
}
