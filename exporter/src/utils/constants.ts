/** Shared constants for the exporter and its CLI. */

/** Asset kind that the encoder and monitor operate on. */
export const SCRIPT_ASSET_KIND = 'Blueprint';

/** `class_type` written into every exported document. */
export const DOCUMENT_CLASS_TYPE = 'Blueprint';

/** Default output directory, relative to the working directory. */
export const DEFAULT_OUTPUT_DIR = 'ExportedDocs/Blueprints';

/** Default directory holding asset source files. */
export const DEFAULT_CONTENT_DIR = 'Content';

/** Configuration file looked up in the working directory. */
export const CONFIG_FILENAME = 'graphdoc.config.json';

/** Mount prefix stripped from asset paths when mapping them to output files. */
export const CONTENT_MOUNT_PREFIX = '/Game/';

/** Type category of execution ports. */
export const EXEC_CATEGORY = 'exec';

/** Type categories that hold references to object instances. */
export const OBJECT_CATEGORIES: ReadonlySet<string> = new Set(['object']);

/** Maximum steps followed when tracing an execution chain in markdown. */
export const EXECUTION_CHAIN_STEP_LIMIT = 50;

/** Dependencies listed per markdown page before the remainder is summarized. */
export const MARKDOWN_DEPENDENCY_LIMIT = 15;

/** Function-call nodes listed per graph in markdown. */
export const MARKDOWN_FUNCTION_CALL_LIMIT = 20;

/** Kind reported by the file change source when an asset cannot be read. */
export const UNKNOWN_ASSET_KIND = 'Unknown';
