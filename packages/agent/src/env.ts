export interface Env {
  OPENROUTER_API_KEY?: string;
  OPENROUTER_BASE_URL?: string;
  AGENT_MODEL?: string;
  /** Extra instructions appended to the classifier system prompt */
  EXTRA_SYSTEM_PROMPT?: string;
}

let env: Env = {};

export function setEnv(newEnv: Env) {
  env = {
    ...env,
    ...newEnv,
  };
}

export function getEnv(): Env {
  return {
    ...env,
  };
}
