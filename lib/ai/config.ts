import { gateway } from "ai"

/** Models available through the AI Gateway */
export const MODELS = {
  fast: "anthropic/claude-haiku-4.5",
  balanced: "anthropic/claude-sonnet-4",
  best: "anthropic/claude-sonnet-4.5",
} as const

export type ModelTier = keyof typeof MODELS

/** Model per AI task */
export const TASK_MODELS = {
  contractQa: MODELS.balanced,
} as const

export type AiTask = keyof typeof TASK_MODELS

/** Model instance for a task, optionally at another tier */
export function getTaskModel(task: AiTask, tier?: ModelTier) {
  return gateway(tier ? MODELS[tier] : TASK_MODELS[task])
}

/** Default generation config */
export const GENERATION_CONFIG = {
  temperature: 0,
  maxOutputTokens: 1024,
} as const
