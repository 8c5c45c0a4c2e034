import type { PairingRound } from '../coffee/types';

export interface HistoryQuery {
  since: Date;
  /** 新しい順にこの件数まで */
  maxRounds: number;
}

/**
 * 過去のラウンドの保存先
 */
export interface HistoryStore {
  loadRecentRounds(query: HistoryQuery): Promise<PairingRound[]>;
  recordRound(round: PairingRound): Promise<void>;
}
