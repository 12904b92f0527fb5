import type { SupabaseClient } from '@supabase/supabase-js';
import type { PredictionRecord } from '../types/contracts.js';

/** Write-only sink for finished predictions. Records are never updated. */
export interface PredictionRecordStore {
  save(record: PredictionRecord): Promise<void>;
}

export type PredictionRow = {
  id: string;
  result: string;
  explanation: string;
  suggestion: string;
  confidence_score: number;
  created_at: string;
};

export function toPredictionRow(record: PredictionRecord): PredictionRow {
  return {
    id: record.id,
    result: record.result,
    explanation: record.explanation,
    suggestion: record.suggestion,
    confidence_score: record.confidence,
    created_at: record.createdAt
  };
}

export class SupabasePredictionStore implements PredictionRecordStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {}

  async save(record: PredictionRecord): Promise<void> {
    const { error } = await this.client.from(this.table).insert(toPredictionRow(record));
    if (error) {
      throw new Error(`Failed to save prediction ${record.id}: ${error.message}`);
    }
  }
}

/** Used when no persistence backend is configured. */
export class DisabledPredictionStore implements PredictionRecordStore {
  async save(): Promise<void> {}
}
