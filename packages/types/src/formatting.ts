/**
 * Options and results shared by the pipeline, the file layer and the CLI.
 */

/**
 * Reorganization rules that can be switched off individually.
 */
export interface OrganizeOptions {
  imports: boolean;
  declarations: boolean;
  classMembers: boolean;
  objectProperties: boolean;
  jsxAttributes: boolean;
  unionTypes: boolean;
  enumMembers: boolean;
  /** Object destructuring in function parameters */
  parameterPatterns: boolean;
}

/**
 * Final cosmetic pass over reassembled text.
 */
export interface StylePass {
  readonly name: string;
  apply(text: string, filename: string): string;
}

export interface FormatStats {
  comments: number;
  inline: number;
  extracted: number;
  reassigned: number;
  standalone: number;
  identities: number;
}

export interface FormatResult {
  output: string;
  changed: boolean;
  stats: FormatStats;
}

export type FileStatus = 'formatted' | 'unchanged' | 'needs-formatting' | 'failed';

export interface FileResult {
  path: string;
  status: FileStatus;
  /** Formatted text, set in stdout mode */
  output?: string;
  backupPath?: string;
  error?: Error;
}
