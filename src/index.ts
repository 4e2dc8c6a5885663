export * from './models/batchReport';
export * from './models/commentStyle';
export * from './models/fileTransformResult';
export * from './models/headerSpan';
export * from './models/headerTemplate';
export * from './models/toolConfig';
export * from './models/updateOptions';
export * from './models/variableSet';
export * from './shared/errors';
export { Logger } from './shared/utils/logger';
export type { LogLevel } from './shared/utils/logger';
export { CommentStyleRegistry } from './services/commentStyleRegistry';
export { KeepLineService } from './services/keepLineService';
export type { KeepLines } from './services/keepLineService';
export { DetectionService, MAX_LEADING_BLANK_LINES } from './services/detectionService';
export { TemplateService } from './services/templateService';
export { HeaderUpdateService } from './services/headerUpdateService';
export { TemplateCatalog } from './services/templateCatalog';
export { VariableService, ENV_PREFIX } from './services/variableService';
export type { VariableSources } from './services/variableService';
export { ConfigService } from './services/configService';
export type { CliOptions } from './services/configService';
export { PathService } from './services/pathService';
export { ApplyHeadersCommand } from './commands/applyHeadersCommand';
export type { ApplyHeadersContext } from './commands/applyHeadersCommand';
export { mergeYears, parseYears, formatYears } from './utils/dateUtils';
export type { YearRange } from './utils/dateUtils';
