// Row shapes as stored in SQLite (snake_case columns, integer booleans).

export interface MemoryRow {
  id: number;
  key: string;
  value: string;
  score: number;
  pinned: number;
  created_at: number;
}

export interface SessionRow {
  id: string;
  started_at: number;
  metadata_json: string | null;
}

export interface TurnRow {
  id: number;
  session_id: string;
  role: string;
  text: string;
  asr_latency_ms: number;
  llm_latency_ms: number;
  tts_latency_ms: number;
  total_latency_ms: number;
  metadata_json: string | null;
  created_at: number;
}

export interface DocumentRow {
  id: string;
  source: string;
  title: string | null;
  created_at: number;
}

export interface ChunkRow {
  id: number;
  document_id: string;
  sequence_no: number;
  text: string;
}
