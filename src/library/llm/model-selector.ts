import type {
  Candidate,
  ClientFactory,
  Credentials,
  ModelConfig,
  Provider,
} from './types.js';
import { DEFAULT_MODEL_ORDER, DEFAULT_PROVIDER } from '../constants.js';
import { loadConfig } from '../config.js';
import { createChatClient, isProviderLibraryAvailable } from './providers.js';

const PROVIDERS: readonly Provider[] = ['openai', 'gemini'];

export interface SelectModelOptions {
  /** Preferred model, tried first. Default: LLM_PRIMARY_MODEL or gpt-5.2 */
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  /** Default: OPENAI_API_KEY / GEMINI_API_KEY */
  credentials?: Credentials;
  isLibraryAvailable?: (provider: Provider) => Promise<boolean>;
  createClient?: ClientFactory;
}

export function inferProvider(model: string): Provider {
  return model.toLowerCase().startsWith('gemini') ? 'gemini' : 'openai';
}

function usableCredential(credentials: Credentials, provider: Provider): string | undefined {
  const key = credentials[provider];
  return key !== undefined && key.trim() !== '' ? key : undefined;
}

/**
 * Build the ordered, de-duplicated candidate list. The preferred model is
 * moved (or prepended) to index 0 when its provider is usable.
 */
export function buildCandidateList(
  primaryModel: string,
  credentials: Credentials,
  availableProviders: ReadonlySet<Provider>
): Candidate[] {
  const candidateFor = (model: string, provider: Provider): Candidate | undefined => {
    if (!availableProviders.has(provider)) return undefined;
    const apiKey = usableCredential(credentials, provider);
    return apiKey === undefined ? undefined : { provider, model, apiKey };
  };

  const base: Candidate[] = [];
  for (const spec of DEFAULT_MODEL_ORDER) {
    const candidate = candidateFor(spec.model, spec.provider);
    if (candidate && !base.some((c) => c.model === candidate.model)) {
      base.push(candidate);
    }
  }

  const existing = base.find((c) => c.model === primaryModel);
  const primary = existing ?? candidateFor(primaryModel, inferProvider(primaryModel));
  if (!primary) return base;

  return [primary, ...base.filter((c) => c.model !== primaryModel)];
}

/**
 * Resolve the model for one request, or `undefined` when no provider is
 * configured. Reads credentials on every call.
 */
export async function selectModel(options: SelectModelOptions = {}): Promise<ModelConfig | undefined> {
  const config = loadConfig();
  const credentials: Credentials = options.credentials ?? {
    openai: config.openaiApiKey,
    gemini: config.geminiApiKey,
  };
  const isLibraryAvailable = options.isLibraryAvailable ?? isProviderLibraryAvailable;
  const createClient = options.createClient ?? createChatClient;
  const temperature = options.temperature ?? config.temperature;
  const timeoutMs = options.timeoutMs ?? config.timeoutMs;

  const availableProviders = new Set<Provider>();
  for (const provider of PROVIDERS) {
    if (usableCredential(credentials, provider) === undefined) continue;
    if (provider === DEFAULT_PROVIDER || (await isLibraryAvailable(provider))) {
      availableProviders.add(provider);
    }
  }

  const candidates = buildCandidateList(
    options.model ?? config.primaryModel,
    credentials,
    availableProviders
  );
  const [first] = candidates;
  if (!first) return undefined;

  return Object.freeze({
    model: first.model,
    temperature,
    timeoutMs,
    apiKey: first.apiKey,
    provider: first.provider,
    client: createClient({ ...first, temperature, timeoutMs }),
    candidates: Object.freeze(candidates),
  });
}
