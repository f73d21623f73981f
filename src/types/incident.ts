// Normalized feed entry produced by the status feed adapter
export interface FeedEntry {
  entry_id: string;          // RSS GUID, falling back to the entry link
  title: string;             // Incident headline
  summary: string;           // Plain-text update body (HTML stripped)
  phase?: string;            // Status word from the update, e.g. "Resolved"
  url?: string;              // Link to the incident page
  published_at: string;      // ISO 8601 timestamp
}

export type IncidentSource = 'rss' | 'webhook';

// One line of incident history as written to the JSON log
export interface IncidentRecord {
  entry_id: string;
  timestamp: string;         // "YYYY-MM-DD HH:MM:SS" (UTC)
  product: string;
  event: string;
  status: string;
  phase?: string;
  url?: string;
  published_at: string;
  detected_at: string;
  source: IncidentSource;
}
