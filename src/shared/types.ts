export interface SessionStats {
  filesProcessed: number;
  filesFailed: number;
  totalModifications: number;
  byEncoding: Record<string, number>;
}

export interface HistoryStats {
  runs: number;
  filesProcessed: number;
  totalModifications: number;
}

export const defaultSessionStats: SessionStats = {
  filesProcessed: 0,
  filesFailed: 0,
  totalModifications: 0,
  byEncoding: {}
};

export const defaultHistoryStats: HistoryStats = {
  runs: 0,
  filesProcessed: 0,
  totalModifications: 0
};
