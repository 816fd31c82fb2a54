export {
	type LazyChunkHandle,
	type LazyTextLoader,
	type LazyTextLoaderOptions,
	type LineMatch,
	openLazyTextLoader,
	type SearchOptions,
} from './lazy-text-loader.js';
export {
	analyzeTextFile,
	processTextFile,
	readTextSmart,
	type SmartReadOptions,
	type SmartReadResult,
	type StreamOptions,
	type TextFileStats,
	transformTextFile,
} from './text-stream.js';
