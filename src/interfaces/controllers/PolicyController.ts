import { Request, Response } from 'express';
import { injectable, inject } from 'inversify';
import { PurchasePolicyUseCase } from '../../application/useCases/PurchasePolicyUseCase';
import { UpdateFlightInfoUseCase } from '../../application/useCases/UpdateFlightInfoUseCase';
import { EvaluateClaimUseCase } from '../../application/useCases/EvaluateClaimUseCase';
import { QueryPoliciesUseCase } from '../../application/useCases/QueryPoliciesUseCase';
import { FlightStatus } from '../../domain/entities/Policy';
import { requireCaller } from '../middleware/requestCaller';
import { presentEvent, presentPolicy, presentReceipt } from '../presenters/PolicyPresenter';

interface CreatePolicyBody {
  holder?: string;
  flightCode: string;
  scheduledDeparture: number;
  scheduledArrival: number;
  paidAmount: string;
}

interface FlightInfoBody {
  actualArrival: number | null;
  flightStatus: FlightStatus;
}

/**
 * HTTP adapter for the policy lifecycle. Bodies and params have already
 * been converted by the joi schemas; errors go to the error middleware.
 */
@injectable()
export class PolicyController {
  constructor(
    @inject('PurchasePolicyUseCase') private purchasePolicyUseCase: PurchasePolicyUseCase,
    @inject('UpdateFlightInfoUseCase') private updateFlightInfoUseCase: UpdateFlightInfoUseCase,
    @inject('EvaluateClaimUseCase') private evaluateClaimUseCase: EvaluateClaimUseCase,
    @inject('QueryPoliciesUseCase') private queryPoliciesUseCase: QueryPoliciesUseCase
  ) {}

  async createPolicy(req: Request, res: Response): Promise<void> {
    const caller = requireCaller(req);
    const body: CreatePolicyBody = req.body;

    const policy = await this.purchasePolicyUseCase.execute({
      caller,
      holder: body.holder ?? caller.id,
      flightCode: body.flightCode,
      scheduledDeparture: body.scheduledDeparture,
      scheduledArrival: body.scheduledArrival,
      paidAmount: BigInt(body.paidAmount)
    });

    res.status(201).json({
      success: true,
      data: presentPolicy(policy)
    });
  }

  async getPolicy(req: Request, res: Response): Promise<void> {
    const policy = await this.queryPoliciesUseCase.getPolicy(Number(req.params.policyId));

    res.status(200).json({
      success: true,
      data: presentPolicy(policy)
    });
  }

  async getHolderPolicies(req: Request, res: Response): Promise<void> {
    const { holder } = req.params;
    const policyIds = await this.queryPoliciesUseCase.getPoliciesByHolder(holder);

    res.status(200).json({
      success: true,
      data: { holder, policyIds }
    });
  }

  async getPolicyEvents(req: Request, res: Response): Promise<void> {
    const events = await this.queryPoliciesUseCase.getPolicyEvents(Number(req.params.policyId));

    res.status(200).json({
      success: true,
      data: events.map(presentEvent)
    });
  }

  async updateFlightInfo(req: Request, res: Response): Promise<void> {
    const body: FlightInfoBody = req.body;

    const policy = await this.updateFlightInfoUseCase.execute({
      caller: requireCaller(req),
      policyId: Number(req.params.policyId),
      actualArrival: body.actualArrival,
      flightStatus: body.flightStatus
    });

    res.status(200).json({
      success: true,
      data: presentPolicy(policy)
    });
  }

  async evaluate(req: Request, res: Response): Promise<void> {
    const result = await this.evaluateClaimUseCase.execute({
      caller: requireCaller(req),
      policyId: Number(req.params.policyId)
    });

    res.status(200).json({
      success: true,
      data: {
        policyId: result.policyId,
        decision: result.decision,
        policyStatus: result.policyStatus,
        claimOutcome: result.claimOutcome,
        ...(result.payout ? { payout: presentReceipt(result.payout) } : {})
      }
    });
  }
}
