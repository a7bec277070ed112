import { Request, Response } from 'express';
import { injectable, inject } from 'inversify';
import { WithdrawFundsUseCase } from '../../application/useCases/WithdrawFundsUseCase';
import { requireCaller } from '../middleware/requestCaller';
import { presentReceipt } from '../presenters/PolicyPresenter';

@injectable()
export class TreasuryController {
  constructor(
    @inject('WithdrawFundsUseCase') private withdrawFundsUseCase: WithdrawFundsUseCase
  ) {}

  async withdraw(req: Request, res: Response): Promise<void> {
    const receipt = await this.withdrawFundsUseCase.execute({
      caller: requireCaller(req),
      destination: String(req.body.destination)
    });

    res.status(200).json({
      success: true,
      data: presentReceipt(receipt)
    });
  }
}
