import 'reflect-metadata';
import { Container } from 'inversify';
import { IPolicyRepository } from './domain/repositories/IPolicyRepository';
import { ISettlementGateway } from './domain/services/ISettlementGateway';
import { IClock } from './domain/services/IClock';
import { InsuranceConfig, loadInsuranceConfig } from './config/insuranceConfig';
import { InMemoryPolicyRepository } from './infrastructure/repositories/InMemoryPolicyRepository';
import { MongoPolicyRepository } from './infrastructure/repositories/MongoPolicyRepository';
import { InMemorySettlementGateway } from './infrastructure/settlement/InMemorySettlementGateway';
import { EthereumSettlementGateway } from './infrastructure/blockchain/EthereumSettlementGateway';
import { SystemClock } from './infrastructure/time/SystemClock';
import { PolicyLockRegistry } from './infrastructure/coordination/PolicyLockRegistry';
import { PolicyEventEmitter } from './infrastructure/events/PolicyEventEmitter';
import { JwtService } from './infrastructure/auth/JwtService';
import { CryptoService } from './infrastructure/auth/CryptoService';
import { MongoDBConnection } from './infrastructure/database/MongoDBConnection';
import { PurchasePolicyUseCase } from './application/useCases/PurchasePolicyUseCase';
import { UpdateFlightInfoUseCase } from './application/useCases/UpdateFlightInfoUseCase';
import { EvaluateClaimUseCase } from './application/useCases/EvaluateClaimUseCase';
import { QueryPoliciesUseCase } from './application/useCases/QueryPoliciesUseCase';
import { WithdrawFundsUseCase } from './application/useCases/WithdrawFundsUseCase';
import { MonitorPoliciesUseCase } from './application/useCases/MonitorPoliciesUseCase';
import { PolicyController } from './interfaces/controllers/PolicyController';
import { TreasuryController } from './interfaces/controllers/TreasuryController';

const container = new Container();

// Configuration is read once; existing policies keep the terms they were opened with
container.bind<InsuranceConfig>('InsuranceConfig').toConstantValue(loadInsuranceConfig());

// Database connection
container.bind<MongoDBConnection>('MongoDBConnection').to(MongoDBConnection).inSingletonScope();

// Repositories - Use MongoDB in production, InMemory for testing
const useMongoDB = process.env.USE_MONGODB === 'true';
if (useMongoDB) {
  container.bind<IPolicyRepository>('IPolicyRepository').to(MongoPolicyRepository).inSingletonScope();
} else {
  container.bind<IPolicyRepository>('IPolicyRepository').to(InMemoryPolicyRepository).inSingletonScope();
}

// Settlement
container.bind<CryptoService>('CryptoService').to(CryptoService);
if (process.env.SETTLEMENT_MODE === 'ethereum') {
  container.bind<ISettlementGateway>('ISettlementGateway').to(EthereumSettlementGateway).inSingletonScope();
} else {
  container.bind<ISettlementGateway>('ISettlementGateway')
    .toDynamicValue(() => new InMemorySettlementGateway(BigInt(process.env.SETTLEMENT_MEMORY_FLOAT || '0')))
    .inSingletonScope();
}

// Services
container.bind<IClock>('IClock').to(SystemClock).inSingletonScope();
container.bind<JwtService>('JwtService').to(JwtService);
container.bind<PolicyLockRegistry>('PolicyLockRegistry').to(PolicyLockRegistry).inSingletonScope();
container.bind<PolicyEventEmitter>('PolicyEventEmitter').toConstantValue(new PolicyEventEmitter());

// Use Cases
container.bind<PurchasePolicyUseCase>('PurchasePolicyUseCase').to(PurchasePolicyUseCase);
container.bind<UpdateFlightInfoUseCase>('UpdateFlightInfoUseCase').to(UpdateFlightInfoUseCase);
container.bind<EvaluateClaimUseCase>('EvaluateClaimUseCase').to(EvaluateClaimUseCase);
container.bind<QueryPoliciesUseCase>('QueryPoliciesUseCase').to(QueryPoliciesUseCase);
container.bind<WithdrawFundsUseCase>('WithdrawFundsUseCase').to(WithdrawFundsUseCase);
container.bind<MonitorPoliciesUseCase>('MonitorPoliciesUseCase').to(MonitorPoliciesUseCase);

// Controllers
container.bind<PolicyController>('PolicyController').to(PolicyController);
container.bind<TreasuryController>('TreasuryController').to(TreasuryController);

export { container };
