import type { AveragedEstimate, EstimateRecord, HistoryQuery, LockInSettings } from '@lockin/shared';
import { DEFAULT_LOCKIN_SETTINGS } from '@lockin/shared';
import type { DatabaseHandle } from '../services/database.js';
import { parseLockInSettings } from '../services/settings.js';

interface EstimateRow {
  id: number;
  run_id: string;
  amplitude: number;
  phase_radians: number;
  timestamp: number;
  settings: string;
  recorded_at: number;
}

const MAX_QUERY_LIMIT = 10_000;

function fromRow(row: EstimateRow): EstimateRecord {
  let settings: LockInSettings;
  try {
    settings = parseLockInSettings(JSON.parse(row.settings));
  } catch {
    settings = { ...DEFAULT_LOCKIN_SETTINGS };
  }
  return {
    id: row.id,
    runId: row.run_id,
    amplitude: row.amplitude,
    phaseRadians: row.phase_radians,
    timestamp: row.timestamp,
    settings,
    recordedAt: row.recorded_at,
  };
}

/**
 * Averaged estimates, one row per loop cycle, grouped by run id.
 */
export class EstimateHistoryService {
  constructor(private readonly db: DatabaseHandle) {}

  record(runId: string, estimate: AveragedEstimate, settings: LockInSettings): EstimateRecord {
    const recordedAt = Date.now();
    const info = this.db
      .prepare(`INSERT INTO estimates (run_id, amplitude, phase_radians, timestamp, settings, recorded_at)
                VALUES (?, ?, ?, ?, ?, ?)`)
      .run(runId, estimate.amplitude, estimate.phaseRadians, estimate.timestamp, JSON.stringify(settings), recordedAt);
    const full: EstimateRecord = {
      ...estimate,
      id: Number(info.lastInsertRowid),
      runId,
      settings: { ...settings },
      recordedAt,
    };
    return full;
  }

  /** Oldest first; `limit` keeps the most recent rows. */
  query(q: HistoryQuery = {}): EstimateRecord[] {
    const limit = Math.min(Math.max(1, Math.floor(q.limit ?? 1000)), MAX_QUERY_LIMIT);
    const rows = q.runId
      ? this.db
          .prepare<[string, number], EstimateRow>('SELECT * FROM estimates WHERE run_id = ? ORDER BY id DESC LIMIT ?')
          .all(q.runId, limit)
      : this.db
          .prepare<[number], EstimateRow>('SELECT * FROM estimates ORDER BY id DESC LIMIT ?')
          .all(limit);
    return rows.reverse().map(fromRow);
  }

  /** Run ids in the order they started. */
  runs(): string[] {
    return this.db
      .prepare<[], { run_id: string }>('SELECT run_id FROM estimates GROUP BY run_id ORDER BY MIN(id)')
      .all()
      .map(r => r.run_id);
  }

  clear(): number {
    const { changes } = this.db.prepare('DELETE FROM estimates').run();
    return changes;
  }
}
