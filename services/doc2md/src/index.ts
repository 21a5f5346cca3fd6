export * from './errors.js'
export type * from './types.js'
export { DEFAULT_ENDPOINT, DEFAULT_MODEL, loadConfigFile, resolveConfig, resolveModelSettings, type CliOverrides, type FileConfig, type ModelOverrides } from './config.js'
export { parseCliArgs, type Doc2MdArgs } from './cliArgs.js'
export { classifyExtension, detectInputFormat, loadInputDocument, SUPPORTED_EXTENSIONS } from './services/formatDetector.js'
export { encodeImage, toDataUrl } from './services/imageEncoder.js'
export { countPdfPages, PDF_RENDER_SCALE, rasterizePdf, type RasterizedPage } from './services/pdfRasterizer.js'
export { buildVisionRequest, DEFAULT_EXTRACTION_PROMPT, type ChatCompletionRequest } from './services/visionRequest.js'
export { extractCompletionText, requestVisionCompletion, VISION_REQUEST_TIMEOUT_MS } from './services/visionProvider.js'
export { convertDocument, joinPages, PAGE_SEPARATOR, type VisionPipelineConfig, type VisionPipelineDeps } from './services/visionPipeline.js'
export { writeMarkdown, writeMarkdownFile } from './services/outputWriter.js'
export { convertDirectory, listPdfFiles, type BatchConversion, type BatchFailure, type BatchResult } from './services/batchConvert.js'
