import { gateway } from 'ai'

/** Available models via Vercel AI Gateway */
export const MODELS = {
  fast: 'anthropic/claude-haiku-4.5',
  balanced: 'anthropic/claude-sonnet-4',
  best: 'anthropic/claude-sonnet-4.5',
} as const

export type ModelTier = keyof typeof MODELS

/** Per-agent model configuration */
export const AGENT_MODELS = {
  contractAnalyzer: MODELS.best,
} as const

export type AgentType = keyof typeof AGENT_MODELS

/**
 * Get model instance for an agent.
 * `modelId` overrides the default (e.g. from ANALYZER_MODEL).
 */
export function getAgentModel(agent: AgentType, modelId?: string) {
  return gateway(modelId ?? AGENT_MODELS[agent])
}

/** Default generation config */
export const GENERATION_CONFIG = {
  temperature: 0,
  maxOutputTokens: 8192,
} as const
