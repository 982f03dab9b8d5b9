import type {
  DeliveryAttemptRecord,
  Lead,
  LeadStatus,
  ValidationRecord,
} from '../lead.entity';

/**
 * Result of a guarded `UPDATE ... WHERE <guard>`:
 * - applied: the guard matched and the row changed
 * - already_applied: nothing changed; the re-read row already shows the target state
 * - conflict: nothing changed; the re-read row is elsewhere (null when missing)
 */
export type TransitionOutcome =
  | { outcome: 'applied' }
  | { outcome: 'already_applied'; current: Lead }
  | { outcome: 'conflict'; current: Lead | null };

/** Fields written once at admission */
export interface LeadDraft {
  sourceId: number;
  offerId: number;
  marketId: number;
  verticalId: number;
  idempotencyKey: string;
  source: string;
  name: string | null;
  email: string | null;
  phone: string | null;
  countryCode: string;
  postalCode: string | null;
  city: string | null;
  regionCode: string | null;
  message: string | null;
  utmSource: string | null;
  utmMedium: string | null;
  utmCampaign: string | null;
  ipAddress: string | null;
  userAgent: string | null;
}

export interface AdmissionRecord {
  leadId: number;
  createdNew: boolean;
}

export interface NormalizedContact {
  normalizedEmail: string | null;
  normalizedPhone: string | null;
}

export interface DuplicateQuery extends NormalizedContact {
  leadId: number;
  offerId: number;
  /** Restricts matches to this source when set */
  sourceId: number | null;
  createdSince: Date;
  excludeStatuses: LeadStatus[];
  matchMode: 'any' | 'all';
}

export interface DuplicateCandidate extends NormalizedContact {
  leadId: number;
  createdAt: Date;
}

export interface LeadStore {
  /** Atomic insert-or-return-existing on (source_id, idempotency_key) */
  insertOrGet(draft: LeadDraft): Promise<AdmissionRecord>;
  findById(leadId: number): Promise<Lead | null>;

  /** Writes only the non-null values, keeping what is already stored */
  saveNormalizedContact(
    leadId: number,
    contact: NormalizedContact,
  ): Promise<void>;
  findLatestDuplicate(query: DuplicateQuery): Promise<DuplicateCandidate | null>;
  /**
   * Flags the lead as a duplicate of another. With a reject reason the same
   * statement also moves it received → rejected.
   */
  markDuplicate(
    leadId: number,
    duplicateOfLeadId: number,
    rejectReason: string | null,
  ): Promise<TransitionOutcome>;

  /** received → validated */
  markValidated(
    leadId: number,
    record: ValidationRecord,
  ): Promise<TransitionOutcome>;
  /** received → rejected */
  markRejected(
    leadId: number,
    reason: string,
    record: ValidationRecord | null,
  ): Promise<TransitionOutcome>;

  /** validated with no buyer → validated with `buyerId` */
  assignBuyer(leadId: number, buyerId: number): Promise<TransitionOutcome>;
  findLastAssignedBuyerId(offerId: number): Promise<number | null>;
  countDeliveredSince(
    buyerId: number,
    offerId: number,
    since: Date,
  ): Promise<number>;

  appendDeliveryAttempts(
    leadId: number,
    attempts: DeliveryAttemptRecord[],
  ): Promise<void>;
  /** validated (assigned to `buyerId`) → delivered */
  markDelivered(leadId: number, buyerId: number): Promise<TransitionOutcome>;

  /**
   * pending → billed on a delivered lead, crediting the buyer balance in the
   * same transaction only when the lead row changed
   */
  recordBilling(
    leadId: number,
    buyerId: number,
    price: number,
  ): Promise<TransitionOutcome>;
}

export const LEAD_STORE = 'LEAD_STORE';
