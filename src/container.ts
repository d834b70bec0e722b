/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes Supabase repositories and the OpenAI runner;
 * tests pass in-memory mocks.
 */

import type { ISessionRepository } from './repositories/ISessionRepository.js';
import type { ITraceRepository } from './repositories/ITraceRepository.js';
import type { IRDSeriesRepository } from './repositories/IRDSeriesRepository.js';
import type { IProvenanceRepository } from './repositories/IProvenanceRepository.js';
import type { ICheckpointRepository } from './repositories/ICheckpointRepository.js';
import type { IBackendRunner } from './providers/IBackendRunner.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import type { AnomalyDetector } from './services/AnomalyDetector.js';
import type { GovernancePolicy } from './types/index.js';
import { SignatureAnomalyDetector } from './services/AnomalyDetector.js';
import { GovernanceService } from './services/GovernanceService.js';
import { ProvenanceService } from './services/ProvenanceService.js';
import { RDService } from './services/RDService.js';
import { SessionService } from './services/SessionService.js';
import { GovernancePolicies } from './services/GovernancePolicies.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  sessionService: SessionService;
  governanceService: GovernanceService;
  provenanceService: ProvenanceService;
  rdService: RDService;
  runner: IBackendRunner;
  /** Name the policy was resolved from, for the health endpoint. */
  policyName: string;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(deps: {
  sessionRepo: ISessionRepository;
  traceRepo: ITraceRepository;
  rdSeriesRepo: IRDSeriesRepository;
  provenanceRepo: IProvenanceRepository;
  checkpointRepo: ICheckpointRepository;
  runner: IBackendRunner;
  logProvider: ILogProvider;
  /** Default: the 'default' preset. */
  policy?: GovernancePolicy;
  policyName?: string;
  detector?: AnomalyDetector;
  now?: () => Date;
}): Container {
  const now = deps.now ?? (() => new Date());
  const provenanceService = new ProvenanceService(deps.provenanceRepo, now);
  const governanceService = new GovernanceService(
    deps.policy ?? GovernancePolicies.default(),
    deps.detector ?? new SignatureAnomalyDetector({ now }),
    provenanceService,
    deps.checkpointRepo,
    deps.logProvider,
    now
  );
  const rdService = new RDService(deps.rdSeriesRepo, deps.logProvider, now);
  const sessionService = new SessionService(
    deps.sessionRepo,
    deps.traceRepo,
    governanceService,
    provenanceService,
    rdService,
    deps.runner,
    deps.logProvider,
    now
  );
  const logging = createLoggingMiddleware(deps.logProvider);

  return {
    sessionService,
    governanceService,
    provenanceService,
    rdService,
    runner: deps.runner,
    policyName: deps.policyName ?? (deps.policy ? 'custom' : 'default'),
    logProvider: deps.logProvider,
    logging,
  };
}
