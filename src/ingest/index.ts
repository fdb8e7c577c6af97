/**
 * Description ingestion: document schemas and directory reading.
 */

export {
  RawPuzzleSchema,
  RawCollectionHeaderSchema,
  RawSolverSchema,
  RawSolverTableSchema,
  parseCollectionDocument,
  parseSolverTable,
  type RawPuzzle,
  type RawCollectionHeader,
  type RawCollectionDocument,
  type RawSolver,
  type RawSolverTable,
  type SourceDocument,
  type DocumentIssue,
  type DocumentIssueKind,
  type ParseResult,
} from "./descriptions.js";
export {
  readDescriptionSources,
  DescriptionLoadError,
  COLLECTIONS_DIR,
  SOLVERS_FILE,
  type DescriptionSources,
} from "./loader.js";
