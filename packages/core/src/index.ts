/**
 * @declsort/core - comment-preserving source reorganizer
 */

// Version
export { DECLSORT_VERSION } from './version.js';

// Errors
export {
  DeclsortError,
  ConfigError,
  FileAccessError,
  LanguageError,
  MissingPositionError,
  FormatError,
} from './errors/DeclsortError.js';
export type { ErrorContext, ErrorSeverity, DeclsortErrorJSON } from './errors/DeclsortError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, closeLogger, isLogLevel, LOG_LEVELS } from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export * from './config/index.js';

// Core utilities
export { LineIndex } from './core/LineIndex.js';
export { toposort, CycleError } from './core/toposort.js';
export type { ToposortItem } from './core/toposort.js';
export { hashParts, shortHash, IDENTITY_HASH_LENGTH } from './core/HashUtils.js';

// Parsing
export { parseSource, isSupportedFile, SUPPORTED_EXTENSIONS } from './parser/parseSource.js';
export type { ParsedSource } from './parser/parseSource.js';
export { CommentStore } from './parser/CommentStore.js';

// Identity
export {
  makeIdentity,
  identifyStatement,
  statementParts,
  containerPath,
  classMemberParts,
  enumMemberParts,
  typeMemberParts,
} from './identity/IdentityAssigner.js';
export type { IdentityParts } from './identity/IdentityAssigner.js';
export { canonicalDigest } from './identity/canonicalDigest.js';

// Comments
export { classifyComment, classifyComments, isBlankIsolated } from './comments/CommentClassifier.js';
export { collectSiblingGroups } from './comments/siblingGroups.js';
export type { SiblingGroup, SiblingMember, GroupKind } from './comments/siblingGroups.js';
export { extractComments, slotAnchor } from './comments/CommentExtractor.js';
export type { ExtractionReport } from './comments/CommentExtractor.js';
export { recoverPositions } from './comments/PositionRecoverer.js';
export { reinsertComments, computeInsertionPoints, compareInsertionPoints } from './comments/CommentReinserter.js';
export { formatCommentLines, formatCommentInline } from './comments/formatComment.js';

// Reorganizer
export { reorganize } from './reorganize/Reorganizer.js';
export type { ReorganizeStats } from './reorganize/Reorganizer.js';
export { organizeImports, importCategory } from './reorganize/imports.js';
export type { ImportCategory } from './reorganize/imports.js';
export { organizeDeclarations, collectEagerReferences, declarationInfo } from './reorganize/declarations.js';
export { sortClassMembers, memberName, memberRank } from './reorganize/classMembers.js';
export { sortObjectProperties } from './reorganize/objectProperties.js';
export { sortObjectPattern, sortParameterPatterns } from './reorganize/parameterPatterns.js';
export { sortJsxAttributes, attributeRank } from './reorganize/jsxAttributes.js';
export { sortTypeMembers, sortEnumMembers, typeSortKey } from './reorganize/typeMembers.js';
export { isSideEffectFree } from './reorganize/purity.js';

// Printing & style
export { printSkeleton, prepareComments } from './printer/SkeletonPrinter.js';
export { WhitespaceStylePass } from './style/WhitespaceStylePass.js';

// Pipeline & files
export { formatSource } from './pipeline/FormatPipeline.js';
export type { FormatOptions } from './pipeline/FormatPipeline.js';
export { discoverFiles, matchesConfig, walkDirectory } from './files/discoverFiles.js';
export { FileFormatter, BACKUP_SUFFIX } from './files/FileFormatter.js';
export type { FormatFileOptions } from './files/FileFormatter.js';

// Shared types
export type * from '@declsort/types';
