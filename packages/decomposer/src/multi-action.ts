/**
 * 複合アクション検出
 *
 * 接続表現・一括系の語・順序語があれば複合リクエストとみなす
 */

/**
 * 複合を示すキーワード
 */
export const CONJUNCTION_KEYWORDS = [
  'して、',
  'した後',
  'してから',
  'って、',
  'て、',
  'と、',
  'それから',
  'その後',
  'ついでに',
  'さらに',
  '一括',
  'まとめて',
  '全部',
  'に割り当て',
  'を割り当て',
  'and then',
  'after that',
  'bulk',
  'all of',
];

/**
 * 単純リクエストを示すキーワード（複合判定より優先）
 */
export const NEGATION_KEYWORDS = ['だけ', 'のみ', 'それだけ', '簡単に', 'とりあえず', 'just ', 'only '];

/**
 * アクション動詞
 */
export const ACTION_VERBS = [
  '作って',
  '送って',
  '教えて',
  '確認して',
  '予約して',
  '完了して',
  '削除して',
  '更新して',
  '調べて',
  '報告して',
  '通知して',
  '招待して',
];

/**
 * アクション動詞の種類数をカウント
 */
export function countActionVerbs(request: string): number {
  return ACTION_VERBS.filter((verb) => request.includes(verb)).length;
}

/**
 * 複合アクションリクエストかを検出
 */
export function detectMultiActionRequest(request: string): boolean {
  const normalized = request.toLowerCase();

  if (NEGATION_KEYWORDS.some((kw) => normalized.includes(kw))) {
    return false;
  }

  if (CONJUNCTION_KEYWORDS.some((kw) => normalized.includes(kw))) {
    return true;
  }

  return countActionVerbs(request) >= 2;
}
