import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';
import { ProviderType } from '../providers/provider-type';

const PROVIDER_NAMES = Object.values(ProviderType).map((p) => `'${p}'`).join(', ');

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid environment variables: ${formatEnvValidationError(e, env)}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}

function formatEnvValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;
  const providerType =
    typeof env === 'object' && env !== null && 'LLM_PROVIDER' in env ? String(env.LLM_PROVIDER) : undefined;

  // Invalid provider type
  const discriminatorIssue = issues.find(issue =>
    issue.code === z.ZodIssueCode.invalid_union_discriminator ||
    (issue.path.length === 1 && issue.path[0] === 'LLM_PROVIDER')
  );
  if (discriminatorIssue) {
    return `LLM_PROVIDER must be one of ${PROVIDER_NAMES}. Received: ${providerType ?? 'undefined'}`;
  }

  // Range and type errors on individual variables
  const fieldErrors = issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  if (fieldErrors.length > 0) {
    return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
  }

  return zodError.message;
}

/**
 * True when the selected provider has an API key. Without one, generation runs in mock mode.
 */
export function hasProviderCredential(env: EnvConfig): boolean {
  switch (env.LLM_PROVIDER) {
    case ProviderType.Gemini:
      return env.GEMINI_API_KEY !== undefined;
    case ProviderType.OpenAI:
      return env.OPENAI_API_KEY !== undefined;
    case ProviderType.Anthropic:
      return env.ANTHROPIC_API_KEY !== undefined;
  }
}
