// Canonical environment variable manifest for the content workflow service.
// Keep in sync with the zod schema in environment.ts.
export type EnvScope = 'dev' | 'prod' | 'runtime' | 'test';
export interface EnvVarDescriptor {
  name: string;
  required: boolean;
  scopes: EnvScope[];
  secret?: boolean;
  default?: string;
  note?: string;
}

export const envManifest: EnvVarDescriptor[] = [
  { name: 'NODE_ENV', required: false, scopes: ['dev', 'runtime', 'prod', 'test'], default: 'development' },
  { name: 'PORT', required: false, scopes: ['dev', 'runtime'], default: '8080' },
  { name: 'LOG_LEVEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'info' },

  // Database
  { name: 'DB_HOST', required: true, scopes: ['dev', 'runtime', 'prod'], secret: true },
  { name: 'DB_PORT', required: false, scopes: ['dev', 'runtime', 'prod'], default: '5432' },
  { name: 'DB_USER', required: true, scopes: ['dev', 'runtime', 'prod'], secret: true },
  { name: 'DB_PASSWORD', required: true, scopes: ['dev', 'runtime', 'prod'], secret: true },
  { name: 'DB_NAME', required: true, scopes: ['dev', 'runtime', 'prod'] },
  { name: 'DB_SSL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'false', note: 'Enable for hosted Postgres endpoints.' },

  // Text generation
  { name: 'OPENAI_API_KEY', required: false, scopes: ['dev', 'runtime', 'prod'], secret: true },
  { name: 'ANTHROPIC_API_KEY', required: false, scopes: ['dev', 'runtime', 'prod'], secret: true },
  { name: 'GOOGLE_GENAI_API_KEY', required: false, scopes: ['dev', 'runtime', 'prod'], secret: true },
  { name: 'DEFAULT_TEXT_MODEL', required: false, scopes: ['dev', 'runtime', 'prod'], default: 'gpt-4o-mini', note: 'Used when a request names no model.' },

  // HTTP API
  { name: 'CONTENT_WORKFLOW_API_KEY', required: false, scopes: ['dev', 'runtime', 'prod'], secret: true, note: 'Requests are rejected when unset.' },
];

export function manifestByName(): Record<string, EnvVarDescriptor> {
  const map: Record<string, EnvVarDescriptor> = {};
  for (const v of envManifest) map[v.name] = v;
  return map;
}
