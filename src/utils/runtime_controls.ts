export function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function isVerboseModeEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.STRANDS_DOCS_VERBOSE);
}

export function isTelemetryDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.STRANDS_DOCS_NO_TELEMETRY);
}
