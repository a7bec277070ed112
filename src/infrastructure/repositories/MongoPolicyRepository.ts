import { injectable, inject } from 'inversify';
import { Collection } from 'mongodb';
import { IPolicyRepository } from '../../domain/repositories/IPolicyRepository';
import { ClaimOutcome, FlightStatus, Policy, PolicyStatus } from '../../domain/entities/Policy';
import { AppError } from '../../domain/errors/AppError';
import { MongoDBConnection } from '../database/MongoDBConnection';
import { logger } from '../logging/Logger';

interface PolicyDocument {
  _id: number;
  holder: string;
  flightCode: string;
  scheduledDeparture: number;
  scheduledArrival: number;
  delayThreshold: number;
  // Amounts are stored as decimal strings; they can exceed Number.MAX_SAFE_INTEGER
  premium: string;
  claimAmount: string;
  createdAt: number;
  policyStatus: PolicyStatus;
  claimOutcome: ClaimOutcome;
  observedFlightStatus: FlightStatus;
  actualArrival: number | null;
  lastEvaluatedAt: number | null;
  payoutReference: string | null;
  updatedAt: Date;
}

interface CounterDocument {
  _id: string;
  seq: number;
}

const POLICY_SEQUENCE = 'policyId';

@injectable()
export class MongoPolicyRepository implements IPolicyRepository {
  private collection: Collection<PolicyDocument>;
  private counters: Collection<CounterDocument>;

  constructor(
    @inject('MongoDBConnection') private dbConnection: MongoDBConnection
  ) {
    const db = this.dbConnection.getDb();
    this.collection = db.collection<PolicyDocument>('policies');
    this.counters = db.collection<CounterDocument>('counters');
    this.createIndexes().catch(error => {
      logger.error('Failed to create policy indexes', { error: error instanceof Error ? error.message : 'Unknown error' });
    });
  }

  private async createIndexes(): Promise<void> {
    await this.collection.createIndex({ holder: 1, _id: 1 }, { name: 'holder_1__id_1' });
    await this.collection.createIndex({ policyStatus: 1 }, { name: 'policyStatus_1' });
    logger.info('MongoDB indexes created for policies collection');
  }

  async nextId(): Promise<number> {
    const counter = await this.counters.findOneAndUpdate(
      { _id: POLICY_SEQUENCE },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after' }
    );
    if (!counter) {
      throw new Error('Failed to allocate policy id');
    }
    return counter.seq;
  }

  async findById(id: number): Promise<Policy | null> {
    const doc = await this.collection.findOne({ _id: id });
    return doc ? this.documentToEntity(doc) : null;
  }

  async findIdsByHolder(holder: string): Promise<number[]> {
    // Ids are allocated under the holder lock, so id order is creation order
    const docs = await this.collection
      .find({ holder }, { projection: { _id: 1 } })
      .sort({ _id: 1 })
      .toArray();
    return docs.map(doc => doc._id);
  }

  async findActive(): Promise<Policy[]> {
    const docs = await this.collection
      .find({ policyStatus: PolicyStatus.ACTIVE })
      .sort({ _id: 1 })
      .toArray();
    return docs.map(doc => this.documentToEntity(doc));
  }

  async save(policy: Policy): Promise<void> {
    await this.collection.insertOne(this.entityToDocument(policy));
    logger.info('Policy saved', { policyId: policy.id, holder: policy.holder });
  }

  async update(policy: Policy): Promise<void> {
    const { _id, ...replacement } = this.entityToDocument(policy);

    // The status filter makes terminal policies immutable even across processes
    const result = await this.collection.replaceOne(
      { _id, policyStatus: PolicyStatus.ACTIVE },
      replacement
    );

    if (result.matchedCount === 0) {
      const exists = await this.collection.countDocuments({ _id }, { limit: 1 });
      throw exists > 0 ? AppError.policyNotActive(_id) : AppError.policyNotFound(_id);
    }

    logger.debug('Policy updated', { policyId: policy.id, policyStatus: policy.policyStatus });
  }

  private documentToEntity(doc: PolicyDocument): Policy {
    return new Policy(
      doc._id,
      doc.holder,
      doc.flightCode,
      doc.scheduledDeparture,
      doc.scheduledArrival,
      doc.delayThreshold,
      BigInt(doc.premium),
      BigInt(doc.claimAmount),
      doc.createdAt,
      doc.policyStatus,
      doc.claimOutcome,
      doc.observedFlightStatus,
      doc.actualArrival,
      doc.lastEvaluatedAt,
      doc.payoutReference
    );
  }

  private entityToDocument(policy: Policy): PolicyDocument {
    return {
      _id: policy.id,
      holder: policy.holder,
      flightCode: policy.flightCode,
      scheduledDeparture: policy.scheduledDeparture,
      scheduledArrival: policy.scheduledArrival,
      delayThreshold: policy.delayThreshold,
      premium: policy.premium.toString(),
      claimAmount: policy.claimAmount.toString(),
      createdAt: policy.createdAt,
      policyStatus: policy.policyStatus,
      claimOutcome: policy.claimOutcome,
      observedFlightStatus: policy.observedFlightStatus,
      actualArrival: policy.actualArrival,
      lastEvaluatedAt: policy.lastEvaluatedAt,
      payoutReference: policy.payoutReference,
      updatedAt: new Date()
    };
  }
}
