export interface LoaderConfig {
  /** Language code requested for YouTube transcripts. */
  transcriptLanguage: string;
  userAgent: string;
}

const DEFAULT_TRANSCRIPT_LANGUAGE = 'pt';
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; DocumentOracle/1.0)';

function resolve(value: string | undefined, fallback: string): string {
  const safe = value?.trim();
  return safe && safe.length > 0 ? safe : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  return {
    transcriptLanguage: resolve(env.ORACLE_TRANSCRIPT_LANGUAGE, DEFAULT_TRANSCRIPT_LANGUAGE),
    userAgent: resolve(env.ORACLE_USER_AGENT, DEFAULT_USER_AGENT),
  };
}
