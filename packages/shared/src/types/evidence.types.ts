export type RelationLabel = 'SUPPORTS' | 'WEAK_SUPPORT' | 'CONTRADICTS' | 'IRRELEVANT';

export interface EvidenceChunk {
  readonly id: string;
  readonly text: string;
  readonly sourceId: string;
  readonly similarityScore: number;
  readonly chunkIndex?: number;
}

export interface LabeledEvidence extends EvidenceChunk {
  readonly relation: RelationLabel;
}

export type EvidenceByClaim = ReadonlyMap<string, readonly EvidenceChunk[]>;

export interface CorpusStats {
  readonly totalChunks: number;
  readonly totalDocuments: number;
}
