/**
 * Production container: Supabase storage, OpenAI runner, Axiom logging.
 * Throws at construction when a required environment variable is missing.
 */

import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import { SupabaseSessionRepository } from './repositories/SupabaseSessionRepository.js';
import { SupabaseTraceRepository } from './repositories/SupabaseTraceRepository.js';
import { SupabaseRDSeriesRepository } from './repositories/SupabaseRDSeriesRepository.js';
import { SupabaseProvenanceRepository } from './repositories/SupabaseProvenanceRepository.js';
import { SupabaseCheckpointRepository } from './repositories/SupabaseCheckpointRepository.js';
import { OpenAIRunner } from './providers/OpenAIRunner.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { resolvePolicy } from './services/GovernancePolicies.js';

let cached: Container | null = null;

export function getProductionContainer(env: NodeJS.ProcessEnv = process.env): Container {
  if (cached) return cached;

  const missing = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'OPENAI_API_KEY'].filter(
    (name) => !env[name]
  );
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const policyName = env.GOVERNANCE_POLICY ?? 'default';
  const policy = resolvePolicy(policyName);

  const db = getSupabaseClient(env);

  // Axiom logging when configured, console otherwise.
  const axiomToken = env.AXIOM_API_KEY;
  const axiomDataset = env.AXIOM_DATASET;
  const logProvider =
    axiomToken && axiomDataset
      ? new AxiomLogProvider({ apiToken: axiomToken, dataset: axiomDataset })
      : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' });

  cached = createContainer({
    sessionRepo: new SupabaseSessionRepository(db),
    traceRepo: new SupabaseTraceRepository(db),
    rdSeriesRepo: new SupabaseRDSeriesRepository(db),
    provenanceRepo: new SupabaseProvenanceRepository(db),
    checkpointRepo: new SupabaseCheckpointRepository(db),
    runner: new OpenAIRunner({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL }),
    logProvider,
    policy,
    policyName: policyName.trim().toLowerCase(),
  });

  return cached;
}
