import { injectable, inject } from 'inversify';
import { ethers } from 'ethers';
import { ISettlementGateway, PayoutInstruction, SettlementReceipt } from '../../domain/services/ISettlementGateway';
import { CryptoService } from '../auth/CryptoService';
import { logger } from '../logging/Logger';

const VAULT_ABI = [
  'function payout(address holder, uint256 amount, bytes32 reference) external',
  'function withdrawAll(address destination) external',
  'event PayoutSent(address indexed holder, uint256 amount, bytes32 indexed reference)'
];

/**
 * Settles through a vault contract holding the collected premiums.
 *
 * The vault rejects a second payout for the same `reference`. Before sending,
 * the gateway looks for the `PayoutSent` log of an earlier transfer under that
 * reference and answers with it, so a claim whose commit failed after the
 * transfer can still be settled.
 */
@injectable()
export class EthereumSettlementGateway implements ISettlementGateway {
  private provider: ethers.JsonRpcProvider;
  private wallet: ethers.Wallet | null = null;
  private readonly vaultAddress: string;
  private readonly vaultFromBlock: number;
  private readonly mockMode: boolean;
  private mockReceipts: Map<string, SettlementReceipt> = new Map();

  constructor(
    @inject('CryptoService') private cryptoService: CryptoService
  ) {
    const rpcUrl = process.env.ETHEREUM_RPC_URL || 'http://localhost:8545';
    this.vaultAddress = process.env.SETTLEMENT_VAULT_ADDRESS || '';
    this.vaultFromBlock = parseInt(process.env.SETTLEMENT_VAULT_FROM_BLOCK || '0', 10);
    this.mockMode = process.env.SETTLEMENT_MOCK_MODE === 'true' || process.env.NODE_ENV === 'development';

    this.provider = new ethers.JsonRpcProvider(rpcUrl);
    this.provider.pollingInterval = 4000;

    if (this.mockMode) {
      logger.warn('Settlement gateway running in MOCK mode - no funds will move');
      return;
    }

    try {
      this.wallet = new ethers.Wallet(this.cryptoService.getSettlementPrivateKey(), this.provider);
      logger.info('Settlement wallet initialized', { address: this.wallet.address });
    } catch (error) {
      logger.error('Failed to initialize settlement wallet', { error: error instanceof Error ? error.message : 'Unknown error' });
      throw error;
    }
  }

  acceptsDestination(destination: string): boolean {
    return ethers.isAddress(destination);
  }

  async payout(instruction: PayoutInstruction): Promise<SettlementReceipt> {
    if (!this.acceptsDestination(instruction.holder)) {
      throw new Error(`Holder is not a valid address: ${instruction.holder}`);
    }

    if (this.mockMode) {
      const existing = this.mockReceipts.get(instruction.reference);
      if (existing) {
        return existing;
      }
      logger.info('MOCK: Simulating vault payout', { reference: instruction.reference, holder: instruction.holder });
      const receipt: SettlementReceipt = {
        reference: instruction.reference,
        destination: instruction.holder,
        amount: instruction.amount,
        transactionHash: `0xmockpayout${Date.now().toString(16)}`
      };
      this.mockReceipts.set(instruction.reference, receipt);
      return receipt;
    }

    const vault = this.getVault();
    const referenceHash = ethers.id(instruction.reference);

    try {
      const settledHash = await this.findSettledPayout(vault, referenceHash);
      if (settledHash) {
        logger.info('Payout already settled on chain, returning original transfer', {
          reference: instruction.reference,
          transactionHash: settledHash
        });
        return {
          reference: instruction.reference,
          destination: instruction.holder,
          amount: instruction.amount,
          transactionHash: settledHash
        };
      }

      const tx: ethers.ContractTransactionResponse = await vault.getFunction('payout')(
        instruction.holder,
        instruction.amount,
        referenceHash
      );
      const receipt = await tx.wait();
      if (!receipt || receipt.status !== 1) {
        throw new Error('Payout transaction reverted');
      }

      logger.info('Payout sent on chain', {
        reference: instruction.reference,
        holder: instruction.holder,
        amount: instruction.amount.toString(),
        transactionHash: receipt.hash
      });

      return {
        reference: instruction.reference,
        destination: instruction.holder,
        amount: instruction.amount,
        transactionHash: receipt.hash
      };
    } catch (error) {
      logger.error('Vault payout error', {
        error: error instanceof Error ? error.message : 'Unknown error',
        reference: instruction.reference,
        holder: instruction.holder,
        signer: this.wallet?.address
      });
      throw new Error('Failed to send payout on chain');
    }
  }

  async withdrawAll(destination: string): Promise<SettlementReceipt> {
    if (!this.acceptsDestination(destination)) {
      throw new Error(`Destination is not a valid address: ${destination}`);
    }

    const reference = `withdraw:${Date.now()}`;
    if (this.mockMode) {
      logger.info('MOCK: Simulating vault withdrawal', { destination });
      return { reference, destination, amount: 0n, transactionHash: `0xmockwithdraw${Date.now().toString(16)}` };
    }

    const vault = this.getVault();

    try {
      const amount = await this.provider.getBalance(this.vaultAddress);
      const tx: ethers.ContractTransactionResponse = await vault.getFunction('withdrawAll')(destination);
      const receipt = await tx.wait();
      if (!receipt || receipt.status !== 1) {
        throw new Error('Withdrawal transaction reverted');
      }

      logger.info('Vault withdrawn', { destination, amount: amount.toString(), transactionHash: receipt.hash });
      return { reference, destination, amount, transactionHash: receipt.hash };
    } catch (error) {
      logger.error('Vault withdrawAll error', {
        error: error instanceof Error ? error.message : 'Unknown error',
        destination,
        signer: this.wallet?.address
      });
      throw new Error('Failed to withdraw vault funds on chain');
    }
  }

  cleanup(): void {
    this.provider.destroy();
  }

  private async findSettledPayout(vault: ethers.Contract, referenceHash: string): Promise<string | null> {
    const logs = await vault.queryFilter(vault.getEvent('PayoutSent')(null, null, referenceHash), this.vaultFromBlock);
    return logs.length > 0 ? logs[0].transactionHash : null;
  }

  protected getVault(): ethers.Contract {
    if (!this.wallet) {
      throw new Error('Wallet not initialized');
    }
    if (!this.vaultAddress) {
      throw new Error('Settlement vault address not configured');
    }
    return new ethers.Contract(this.vaultAddress, VAULT_ABI, this.wallet);
  }
}
