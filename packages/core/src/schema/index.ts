export {
  DEFAULT_CONFIG,
  DEFAULT_VERBOSITY,
  GlyphlogConfigSchema,
  GlyphOverridesSchema,
  LOG_LEVELS,
  LogLevelSchema,
  VerbosityConfigSchema,
  type GlyphlogConfig,
  type GlyphOverrides,
  type LogLevel,
  type VerbosityConfig,
} from "./config";
