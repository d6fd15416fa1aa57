export interface Config {
  port: number;
  bind: string;
  apiToken: string;
  apiBase: string;
  model: string;
  sandboxRoot: string;
  generationTimeoutMs: number;
  execTimeoutMs: number;
  scriptBin: string;
  shellBin: string;
  denyGlobs: string[];
  accessToken: string | null;
  maxConcurrent: number;
  promptAppend: string;
  maxTaskBytes: number;
}

function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const value = parseInt(raw ?? '', 10);
  return Number.isFinite(value) && value >= min && value <= max ? value : fallback;
}

export function loadConfig(): Config {
  const apiToken = process.env.TR_API_TOKEN;
  if (!apiToken) {
    throw new Error('TR_API_TOKEN is required but not set');
  }

  const denyGlobsRaw = process.env.TR_DENY_GLOBS || '';
  const denyGlobs = denyGlobsRaw.split(',').map(s => s.trim()).filter(Boolean);

  return {
    port: parseIntEnv(process.env.TR_PORT, 8000, 1, 65535),
    bind: process.env.TR_BIND || '0.0.0.0',
    apiToken,
    apiBase: process.env.TR_API_BASE || 'https://api.openai.com/v1',
    model: process.env.TR_MODEL || 'gpt-4o-mini',
    sandboxRoot: process.env.TR_SANDBOX_ROOT || '/data',
    generationTimeoutMs: parseIntEnv(process.env.TR_GENERATION_TIMEOUT_MS, 20_000, 1, 600_000),
    execTimeoutMs: parseIntEnv(process.env.TR_EXEC_TIMEOUT_MS, 0, 0, 3_600_000),
    scriptBin: process.env.TR_SCRIPT_BIN || 'python3',
    shellBin: process.env.TR_SHELL_BIN || 'bash',
    denyGlobs,
    accessToken: process.env.TR_ACCESS_TOKEN || null,
    maxConcurrent: parseIntEnv(process.env.TR_MAX_CONCURRENT, 4, 1, 256),
    promptAppend: process.env.TR_PROMPT_APPEND || '',
    maxTaskBytes: 4096,
  };
}
