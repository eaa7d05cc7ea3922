export type RecipeKind = 'atomic' | 'workflow';

export type RecipeRuntime = 'chrome-script' | 'process' | 'shell';

export type RecipeSource = 'Project' | 'User' | 'System';

export const SOURCE_PRIORITY: readonly RecipeSource[] = ['Project', 'User', 'System'];

export interface InputDeclaration {
  type: string;
  required: boolean;
  default?: unknown;
  description?: string;
}

export interface EnvDeclaration {
  required: boolean;
  default?: string;
  description?: string;
}

export interface RecipeMetadata {
  name: string;
  kind: RecipeKind;
  runtime: RecipeRuntime;
  version: string;
  description: string;
  inputs: Record<string, InputDeclaration>;
  outputs: Record<string, string>;
  dependencies: string[];
  tags: string[];
  env: Record<string, EnvDeclaration>;
  source: RecipeSource;
  scriptPath: string;
  metadataPath: string;
  /** Lower-priority namespaces that define the same name. */
  shadowed: RecipeSource[];
}

export interface Namespace {
  source: RecipeSource;
  root: string;
}

export interface RegistryDiagnostic {
  source: RecipeSource;
  path: string;
  kind: string;
  message: string;
  recipe?: string;
}
