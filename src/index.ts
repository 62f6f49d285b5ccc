export type * from './types/cube.ts';

export * from './lib/constants.ts';
export { rgbToHsv, hueDistance, colorDistance, classifyHsv, classifySample, classifyFrame, REFERENCE_PALETTE } from './lib/colorClassifier.ts';
export type { ClassifierOptions } from './lib/colorClassifier.ts';
export { gridGeometry, samplePatch, sampleFrame } from './lib/frameSampler.ts';
export type { GridGeometry } from './lib/frameSampler.ts';
export { createHistory, requiredVotes, tallyPosition, stabilize } from './lib/temporalStabilizer.ts';
export type { History, StabilizerOptions, StabilizeResult } from './lib/temporalStabilizer.ts';
export { faceIndexFor, resolveFace, sameReading } from './lib/faceResolver.ts';
export type { Resolution } from './lib/faceResolver.ts';
export { CommitChannel } from './lib/commitChannel.ts';
export type { CommitChannelOptions, Scheduler } from './lib/commitChannel.ts';
export { ScanPipeline } from './lib/scanPipeline.ts';
export type { ScanPipelineOptions } from './lib/scanPipeline.ts';
export { withLockedBuffer, createPixelBuffer, MemoryPixelBuffer, BYTES_PER_PIXEL } from './lib/pixelBuffer.ts';
export type { PixelBufferInit } from './lib/pixelBuffer.ts';
export {
  DEFAULT_SCANNER_CONFIG,
  ScannerConfigError,
  resolveScannerConfig,
  scannerConfigFromEnv,
} from './lib/config.ts';
export type { ScannerConfig, ScannerConfigOverrides } from './lib/config.ts';
export { createLogger, getLogger, setLogLevel } from './lib/logger.ts';
export type { Logger, LogLevel, LogThreshold } from './lib/logger.ts';
export { createCubeStore, cubeFaceOwner, buildFaceletString, validateFaces } from './stores/cubeStore.ts';
export type { CubeStore, CubeStoreApi } from './stores/cubeStore.ts';
export { createScannerStore, guidanceFor } from './stores/scannerStore.ts';
export type { ScannerStore, ScannerStoreApi } from './stores/scannerStore.ts';
