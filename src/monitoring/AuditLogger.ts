/**
 * @packageDocumentation
 * @module AuditLogger
 * @description
 * In-memory record of every NVP call that received a reply.
 *
 * Each record keeps the procedure name, environment, ACK, correlation id and
 * the first error code, which is what support needs to trace a call on the
 * gateway side. Credentials and request parameters are never stored.
 */
import { randomUUID } from 'crypto';
import { NVPEnvironment } from '../types/nvp';

export interface NVPCallRecord {
  id: string;
  method: string;
  environment: NVPEnvironment;
  ack: string;
  correlationId: string;
  errorCode?: string;
  success: boolean;
  timestamp: number;
}

export interface AuditQueryOptions {
  method?: string;
  success?: boolean;
  startTime?: number;
  endTime?: number;
  limit?: number;
  offset?: number;
}

export class AuditLogger {
  private records: NVPCallRecord[] = [];

  log(entry: Omit<NVPCallRecord, 'id' | 'timestamp'>): NVPCallRecord {
    const record: NVPCallRecord = {
      ...entry,
      id: randomUUID(),
      timestamp: Date.now(),
    };
    this.records.push(record);
    return record;
  }

  getLogs(options: AuditQueryOptions = {}): NVPCallRecord[] {
    let logs = [...this.records];

    if (options.method !== undefined) {
      logs = logs.filter((l) => l.method === options.method);
    }
    if (options.success !== undefined) {
      logs = logs.filter((l) => l.success === options.success);
    }

    const { startTime, endTime } = options;
    if (startTime !== undefined) {
      logs = logs.filter((l) => l.timestamp >= startTime);
    }
    if (endTime !== undefined) {
      logs = logs.filter((l) => l.timestamp <= endTime);
    }

    // Newest first; stable sort keeps insertion order reversed for equal timestamps
    logs.reverse();
    logs.sort((a, b) => b.timestamp - a.timestamp);

    const offset = options.offset ?? 0;
    const limit = options.limit ?? 50;

    return logs.slice(offset, offset + limit);
  }

  clear(): void {
    this.records = [];
  }
}
