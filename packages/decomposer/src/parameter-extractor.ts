import type { WorkflowContext } from '@taskflow/workflow-spec';

/**
 * 抽出済みパラメータ
 */
export interface ExtractedParams {
  datetime?: string;
  time?: string;
  assignee?: string;
  participants?: string[];
  task_body?: string;
  search_query?: string;
  announcement_text?: string;
  room?: string;
  [key: string]: unknown;
}

const RELATIVE_DAYS: Array<[string, string]> = [
  ['明日', 'tomorrow'],
  ['今日', 'today'],
  ['来週', 'next_week'],
];

const TIME_PATTERN = /(\d{1,2})[:時](\d{0,2})/;
const SAN_PATTERN = /([一-龠々ァ-ヶーa-zA-Z]+)さん/g;
const ROOM_PATTERN = /(第?[0-9０-９A-Za-z]+)会議室/;
const ANNOUNCEMENT_CUE = /アナウンス|お知らせ|周知/;
const QUOTED = /「([^」]+)」/;

const TASK_BODY_PATTERNS = [
  /「([^」]+)」(?:を|の|という)/,
  /タスク[「『]([^」』]+)[」』]/,
  /([^、。]+?)(?:を作って|を作成)/,
];

const SEARCH_QUERY_PATTERNS = [
  /「([^」]+)」(?:について|を調べて|を検索)/,
  /([^、。]+?)(?:について調べて|を教えて)/,
];

/**
 * リクエストからパラメータを抽出
 *
 * 日時・人名・タスク内容・検索クエリ・アナウンス本文・会議室
 */
export class ParameterExtractor {
  extract(request: string, context: WorkflowContext): ExtractedParams {
    const params: ExtractedParams = {};

    const datetime = this.extractDatetime(request);
    if (datetime) {
      params.datetime = datetime;
    }

    const time = this.extractTime(request);
    if (time) {
      params.time = time;
    }

    const names = this.extractPersonNames(request, context);
    if (names.length > 0) {
      params.assignee = names[0];
      params.participants = names;
    }

    const taskBody = this.firstMatch(request, TASK_BODY_PATTERNS);
    if (taskBody) {
      params.task_body = taskBody;
    }

    const searchQuery = this.firstMatch(request, SEARCH_QUERY_PATTERNS);
    if (searchQuery) {
      params.search_query = searchQuery;
    }

    if (ANNOUNCEMENT_CUE.test(request)) {
      const quoted = QUOTED.exec(request);
      if (quoted) {
        params.announcement_text = quoted[1].trim();
      }
    }

    const room = ROOM_PATTERN.exec(request);
    if (room) {
      params.room = `${room[1]}会議室`;
    }

    return params;
  }

  /**
   * 相対日付、なければ時刻
   */
  private extractDatetime(request: string): string | undefined {
    for (const [word, value] of RELATIVE_DAYS) {
      if (request.includes(word)) {
        return value;
      }
    }
    return this.extractTime(request);
  }

  private extractTime(request: string): string | undefined {
    const match = TIME_PATTERN.exec(request);
    if (!match) {
      return undefined;
    }
    const minute = match[2] ? match[2].padStart(2, '0') : '00';
    return `${match[1]}:${minute}`;
  }

  /**
   * 既知の人物名 → 「〇〇さん」の順
   */
  private extractPersonNames(request: string, context: WorkflowContext): string[] {
    const names: string[] = [];

    for (const name of context.known_person_names ?? []) {
      if (request.includes(name) && !names.includes(name)) {
        names.push(name);
      }
    }

    for (const match of request.matchAll(SAN_PATTERN)) {
      if (!names.includes(match[1])) {
        names.push(match[1]);
      }
    }

    return names;
  }

  private firstMatch(request: string, patterns: RegExp[]): string | undefined {
    for (const pattern of patterns) {
      const match = pattern.exec(request);
      if (match) {
        return match[1].trim();
      }
    }
    return undefined;
  }
}
