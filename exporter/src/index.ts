export type * from './models/scriptAsset.js';
export type * from './models/document.js';
export type * from './models/collaborators.js';
export { CHANGE_EVENT_CLASSES } from './models/collaborators.js';

export { typeToString, encodePort, encodeNode, encodeGraph, connectedNodeIds, outgoingWires } from './services/graphEncoder.js';
export { classifyNode, nodeTypeString } from './services/nodeClassifier.js';
export { extractDependencies } from './services/dependencyExtractor.js';
export {
  serializeAsset,
  documentToJson,
  encodeVariable,
  encodeFunction,
  encodeComponents,
  functionParameters,
  EMPTY_DOCUMENT_JSON,
} from './services/assetEncoder.js';
export type { SerializeResult } from './services/assetEncoder.js';
export { renderLiteral } from './services/literalRenderer.js';
export type { LiteralValue } from './services/literalRenderer.js';
export { parseAssetSource, loadAssetFile, readAssetClass } from './services/assetLoader.js';
export { ChangeMonitor } from './services/changeMonitor.js';
export type { MonitorState, AssetChangedCallback, ChangeMonitorOptions } from './services/changeMonitor.js';
export { NotificationHub } from './services/notificationHub.js';
export { FileAssetRepository, handleForFile } from './services/fileAssetRepository.js';
export { FileChangeSource } from './services/fileChangeSource.js';
export type { FileChangeSourceOptions } from './services/fileChangeSource.js';
export { FileDocumentWriter } from './services/fileDocumentWriter.js';
export { renderAssetMarkdown, renderGraphDetail, renderIndexMarkdown } from './services/markdownRenderer.js';
export {
  ExportService,
  outputPathFor,
  listMarkdownPages,
  regenerateMarkdown,
  readDocumentFile,
  INDEX_FILENAME,
} from './services/exportService.js';
export type { ExportServiceOptions, ExportAllResult } from './services/exportService.js';

export { ExportLogger, defaultLogger } from './utils/exportLogger.js';
export type { LogLevel, LogData, ExportLoggerOptions } from './utils/exportLogger.js';
export { loadConfig } from './utils/config.js';
export type { ExporterConfig, LoadConfigOptions } from './utils/config.js';
export { InputError, AssetFormatError, ConfigError } from './utils/errors.js';
export * from './utils/constants.js';
