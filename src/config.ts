export interface SchemaConfig {
  /** Emit debug log lines for serialized and rejected documents */
  debug: boolean;
  /** Indentation used by `toJson` when the caller passes none */
  jsonIndent: number;
}

const MAX_JSON_INDENT = 10;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SchemaConfig {
  const debugFlag = (env.CODE_INSIGHTS_DEBUG || '').trim().toLowerCase();
  const rawIndent = (env.CODE_INSIGHTS_JSON_INDENT || '0').trim();
  const indent = /^\d+$/.test(rawIndent) ? parseInt(rawIndent, 10) : Number.NaN;

  return {
    debug: debugFlag === 'true' || debugFlag === '1',
    jsonIndent: Number.isInteger(indent) && indent >= 0 && indent <= MAX_JSON_INDENT ? indent : 0,
  };
}
