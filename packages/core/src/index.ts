/**
 * glyphlog core library
 *
 * Terminal rendering for command-line programs: leveled glyph messages,
 * nested trace frames, context banners, tables, boxes and prompts, all
 * written synchronously to stderr.
 */

// Renderer
export {
  Stderr,
  type LayoutResult,
  type LoggerOptions,
  type ScopeResult,
} from "./logger";
export { getLogger, resetLogger } from "./global";

// Trace frames
export {
  DEFAULT_ENTER_TEXT,
  DEFAULT_EXIT_TEXT,
  enterFrame,
  ScopeHandle,
  TraceStack,
  type HandleResult,
  type TraceFrame,
  type TraceWriter,
} from "./trace";

// Context
export {
  ContextController,
  type BannerWriter,
  type ContextState,
} from "./context";

// Confirmation prompts
export {
  ConfirmBuilder,
  createLineReader,
  MAX_CONFIRM_ATTEMPTS,
  parseAnswer,
  type ConfirmAnswer,
  type ConfirmHost,
  type InputReader,
} from "./confirm";

// Sinks
export {
  createMemorySink,
  createStreamSink,
  type MemorySink,
  type Sink,
  type WritableLike,
} from "./sink";

// Errors
export {
  ConfigError,
  describeCause,
  GlyphlogError,
  HandleMisuseError,
  InputError,
  IoError,
  LayoutError,
  type ErrorCategory,
  type GlyphlogErrorOptions,
} from "./errors";

// Configuration
export {
  ENV_MAP,
  findFileUp,
  loadConfig,
  parseEnvFlag,
  PROJECT_CONFIG_FILENAME,
  resolveVerbosity,
  type LoadConfigOptions,
} from "./config";

// Levels and glyphs
export {
  DEFAULT_LEVEL_STYLES,
  withGlyphOverrides,
  type GlyphColorTable,
  type LevelStyle,
} from "./levels";
export {
  glyph,
  GlyphEntrySchema,
  loadGlyphCatalogue,
  type GlyphEntry,
} from "./catalogue";
export { describeValue, type Describable, type DescribeOptions } from "./describe";

// Color
export {
  contrastFor,
  createAnsis,
  getAnsis,
  paint,
  PALETTE_SIZE,
  resetColorInstance,
  shouldUseColor,
  swatch,
} from "./style";

// Re-export schemas
export * from "./schema";

// Render utilities
export * from "./render";
