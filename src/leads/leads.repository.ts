import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Brackets,
  EntityManager,
  In,
  IsNull,
  MoreThanOrEqual,
  Not,
  Repository,
} from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { z } from 'zod';
import { Buyer } from '../catalog/entities';
import {
  BillingStatus,
  DeliveryAttemptRecord,
  Lead,
  LeadStatus,
  ValidationRecord,
} from './lead.entity';
import {
  AdmissionRecord,
  DuplicateCandidate,
  DuplicateQuery,
  LeadDraft,
  LeadStore,
  NormalizedContact,
  TransitionOutcome,
} from './interfaces/lead-store.interface';
import { settleTransition, transitionReached } from './lead-transitions';

interface Guard {
  status?: LeadStatus;
  /** null requires `buyer_id IS NULL` */
  buyerId?: number | null;
  billingStatus?: BillingStatus;
}

const insertedRowsSchema = z.array(z.object({ id: z.coerce.number().int() }));

/**
 * TypeORM implementation of LeadStore. Every status change is a single
 * `UPDATE leads ... WHERE id = :id AND <guard>`; no row lock is held across
 * anything but the statements of one method.
 */
@Injectable()
export class LeadsRepository implements LeadStore {
  private readonly logger = new Logger(LeadsRepository.name);

  constructor(
    @InjectRepository(Lead)
    private readonly leads: Repository<Lead>,
  ) {}

  async insertOrGet(draft: LeadDraft): Promise<AdmissionRecord> {
    const result = await this.leads
      .createQueryBuilder()
      .insert()
      .into(Lead)
      .values({ ...draft, status: 'received' })
      .orIgnore()
      .returning(['id'])
      .execute();

    const inserted = insertedRowsSchema.safeParse(result.raw);
    const [row] = inserted.success ? inserted.data : [];
    if (row) {
      return { leadId: row.id, createdNew: true };
    }

    // ON CONFLICT DO NOTHING waited for the competing insert to commit
    const existing = await this.leads.findOne({
      where: { sourceId: draft.sourceId, idempotencyKey: draft.idempotencyKey },
      select: { id: true },
    });
    if (!existing) {
      throw new Error(
        `Idempotent insert returned no row for source ${draft.sourceId}`,
      );
    }
    return { leadId: existing.id, createdNew: false };
  }

  findById(leadId: number): Promise<Lead | null> {
    return this.leads.findOne({ where: { id: leadId } });
  }

  async saveNormalizedContact(
    leadId: number,
    contact: NormalizedContact,
  ): Promise<void> {
    const changes: QueryDeepPartialEntity<Lead> = {};
    if (contact.normalizedEmail !== null) {
      changes.normalizedEmail = contact.normalizedEmail;
    }
    if (contact.normalizedPhone !== null) {
      changes.normalizedPhone = contact.normalizedPhone;
    }
    if (Object.keys(changes).length > 0) {
      await this.leads.update({ id: leadId }, changes);
    }
  }

  async findLatestDuplicate(
    query: DuplicateQuery,
  ): Promise<DuplicateCandidate | null> {
    const keyClauses: string[] = [];
    if (query.normalizedEmail !== null) {
      keyClauses.push('lead.normalizedEmail = :email');
    }
    if (query.normalizedPhone !== null) {
      keyClauses.push('lead.normalizedPhone = :phone');
    }
    if (keyClauses.length === 0) {
      return null;
    }

    const qb = this.leads
      .createQueryBuilder('lead')
      .where('lead.offerId = :offerId', { offerId: query.offerId })
      .andWhere('lead.id != :leadId', { leadId: query.leadId })
      .andWhere('lead.createdAt >= :since', { since: query.createdSince })
      .andWhere(
        new Brackets((keys) => {
          keys.where(
            keyClauses.join(query.matchMode === 'all' ? ' AND ' : ' OR '),
            {
              email: query.normalizedEmail,
              phone: query.normalizedPhone,
            },
          );
        }),
      );

    if (query.excludeStatuses.length > 0) {
      qb.andWhere('lead.status NOT IN (:...excluded)', {
        excluded: query.excludeStatuses,
      });
    }
    if (query.sourceId !== null) {
      qb.andWhere('lead.sourceId = :sourceId', { sourceId: query.sourceId });
    }

    const match = await qb
      .orderBy('lead.createdAt', 'DESC')
      .addOrderBy('lead.id', 'DESC')
      .getOne();

    return match
      ? {
          leadId: match.id,
          createdAt: match.createdAt,
          normalizedEmail: match.normalizedEmail,
          normalizedPhone: match.normalizedPhone,
        }
      : null;
  }

  markDuplicate(
    leadId: number,
    duplicateOfLeadId: number,
    rejectReason: string | null,
  ): Promise<TransitionOutcome> {
    if (rejectReason === null) {
      return this.guardedUpdate(
        this.leads.manager,
        leadId,
        {},
        { isDuplicate: true, duplicateOfLeadId },
        (lead) => lead.duplicateOfLeadId === duplicateOfLeadId,
      );
    }
    return this.guardedUpdate(
      this.leads.manager,
      leadId,
      { status: 'received' },
      {
        isDuplicate: true,
        duplicateOfLeadId,
        status: 'rejected',
        validationReason: rejectReason,
      },
      transitionReached.rejected,
    );
  }

  markValidated(
    leadId: number,
    record: ValidationRecord,
  ): Promise<TransitionOutcome> {
    return this.guardedUpdate(
      this.leads.manager,
      leadId,
      { status: 'received' },
      { status: 'validated', validationReason: null, validationResult: record },
      transitionReached.validated,
    );
  }

  markRejected(
    leadId: number,
    reason: string,
    record: ValidationRecord | null,
  ): Promise<TransitionOutcome> {
    return this.guardedUpdate(
      this.leads.manager,
      leadId,
      { status: 'received' },
      {
        status: 'rejected',
        validationReason: reason,
        ...(record ? { validationResult: record } : {}),
      },
      transitionReached.rejected,
    );
  }

  assignBuyer(leadId: number, buyerId: number): Promise<TransitionOutcome> {
    return this.guardedUpdate(
      this.leads.manager,
      leadId,
      { status: 'validated', buyerId: null },
      { buyerId, routedAt: new Date() },
      transitionReached.assigned(buyerId),
    );
  }

  async findLastAssignedBuyerId(offerId: number): Promise<number | null> {
    const last = await this.leads.findOne({
      where: { offerId, buyerId: Not(IsNull()), routedAt: Not(IsNull()) },
      order: { routedAt: 'DESC', id: 'DESC' },
      select: { id: true, buyerId: true },
    });
    return last?.buyerId ?? null;
  }

  countDeliveredSince(
    buyerId: number,
    offerId: number,
    since: Date,
  ): Promise<number> {
    return this.leads.count({
      where: {
        buyerId,
        offerId,
        status: In(['delivered', 'accepted']),
        deliveredAt: MoreThanOrEqual(since),
      },
    });
  }

  async appendDeliveryAttempts(
    leadId: number,
    attempts: DeliveryAttemptRecord[],
  ): Promise<void> {
    if (attempts.length === 0) {
      return;
    }
    await this.leads.manager.transaction(async (manager) => {
      const lead = await manager.findOne(Lead, {
        where: { id: leadId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!lead) {
        this.logger.warn(`Cannot record delivery attempts: lead ${leadId} missing`);
        return;
      }
      const highestAttempt = Math.max(
        lead.deliveryAttempts,
        ...attempts.map((attempt) => attempt.attemptNumber),
      );
      await manager.update(
        Lead,
        { id: leadId },
        {
          deliveryAttempts: highestAttempt,
          deliveryResult: [...(lead.deliveryResult ?? []), ...attempts],
        },
      );
    });
  }

  markDelivered(leadId: number, buyerId: number): Promise<TransitionOutcome> {
    return this.guardedUpdate(
      this.leads.manager,
      leadId,
      { status: 'validated', buyerId },
      { status: 'delivered', deliveredAt: new Date() },
      transitionReached.delivered(buyerId),
    );
  }

  recordBilling(
    leadId: number,
    buyerId: number,
    price: number,
  ): Promise<TransitionOutcome> {
    return this.leads.manager.transaction(async (manager) => {
      const outcome = await this.guardedUpdate(
        manager,
        leadId,
        { status: 'delivered', buyerId, billingStatus: 'pending' },
        { billingStatus: 'billed', price, billedAt: new Date() },
        transitionReached.billed,
      );
      if (outcome.outcome !== 'applied') {
        return outcome;
      }

      await manager
        .createQueryBuilder()
        .update(Buyer)
        .set({ balance: () => 'balance + :price' })
        .where('id = :buyerId', { buyerId })
        .setParameter('price', price)
        .execute();
      return outcome;
    });
  }

  private async guardedUpdate(
    manager: EntityManager,
    leadId: number,
    guard: Guard,
    changes: QueryDeepPartialEntity<Lead>,
    reached: (lead: Lead) => boolean,
  ): Promise<TransitionOutcome> {
    const update = manager
      .createQueryBuilder()
      .update(Lead)
      .set(changes)
      .where('id = :leadId', { leadId });

    if (guard.status !== undefined) {
      update.andWhere('status = :expectedStatus', {
        expectedStatus: guard.status,
      });
    }
    if (guard.buyerId === null) {
      update.andWhere('buyer_id IS NULL');
    } else if (guard.buyerId !== undefined) {
      update.andWhere('buyer_id = :expectedBuyerId', {
        expectedBuyerId: guard.buyerId,
      });
    }
    if (guard.billingStatus !== undefined) {
      update.andWhere('billing_status = :expectedBillingStatus', {
        expectedBillingStatus: guard.billingStatus,
      });
    }

    const result = await update.execute();
    if (result.affected === 1) {
      return { outcome: 'applied' };
    }

    const current = await manager.findOne(Lead, { where: { id: leadId } });
    return settleTransition(current, reached);
  }
}
