/**
 * Audit ledger event types:
 * - RUN_* = Experiment tracker lifecycle
 * - GATE_EVALUATED = Evaluation produced a gate decision
 * - MODEL_VERSION_* = Registry mutations
 * - ALIAS_* = Alias state machine transitions
 * - PROMOTION_REJECTED = Gate refused a promotion (alias unchanged)
 */
export enum LedgerEventType {
  RUN_STARTED = 'RUN_STARTED',
  RUN_FINISHED = 'RUN_FINISHED',
  RUN_FAILED = 'RUN_FAILED',
  GATE_EVALUATED = 'GATE_EVALUATED',
  MODEL_VERSION_REGISTERED = 'MODEL_VERSION_REGISTERED',
  MODEL_VERSION_DESCRIBED = 'MODEL_VERSION_DESCRIBED',
  MODEL_VERSION_DELETED = 'MODEL_VERSION_DELETED',
  ALIAS_ASSIGNED = 'ALIAS_ASSIGNED',
  ALIAS_PROMOTED = 'ALIAS_PROMOTED',
  ALIAS_REMOVED = 'ALIAS_REMOVED',
  PROMOTION_REJECTED = 'PROMOTION_REJECTED',
}

export type LedgerSubjectType = 'MODEL' | 'RUN';

export type LedgerValue = string | number | boolean | null | string[] | undefined;

/**
 * Ledger entry
 */
export interface LedgerEntry {
  entryId: string;
  subjectType: LedgerSubjectType;
  /** Model name or run id */
  subjectId: string;
  eventType: LedgerEventType;
  timestamp: string;
  actor: string;
  data: Record<string, LedgerValue>;
}

/**
 * Ledger query filters
 */
export interface LedgerQuery {
  subjectType: LedgerSubjectType;
  subjectId: string;
  eventType?: LedgerEventType;
  limit?: number;
}

/**
 * Ledger service interface
 */
export interface ILedgerService {
  append(entry: Omit<LedgerEntry, 'entryId' | 'timestamp'>): Promise<LedgerEntry>;
  query(query: LedgerQuery): Promise<LedgerEntry[]>;
}
