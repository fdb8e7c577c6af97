/**
 * Compile errors.
 */

import type { DocumentIssueKind } from "../ingest/descriptions.js";

export type CompileIssueKind = DocumentIssueKind | "unknown_reference" | "duplicate_collection";

/**
 * Individual compile issue, located by collection, record index and field.
 */
export interface CompileIssue {
  kind: CompileIssueKind;
  /** Collection (document) name; "solvers" for the solver table */
  collection: string;
  /** Record index in declaration order */
  index?: number;
  field: string;
  message: string;
}

/**
 * Thrown by compileOrThrow. Carries every issue found, not just the first.
 */
export class CompileError extends Error {
  public readonly issues: CompileIssue[];

  constructor(message: string, issues: CompileIssue[]) {
    super(message);
    this.name = "CompileError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Compilation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${formatCompileIssue(issue)}`);
    }
    return lines.join("\n");
  }
}

export function formatCompileIssue(issue: CompileIssue): string {
  const location =
    issue.index !== undefined ? `[${issue.collection}#${issue.index}]` : `[${issue.collection}]`;
  return `${location} ${issue.field}: ${issue.message} (${issue.kind})`;
}
