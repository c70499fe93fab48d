/**
 * Backend-specific types
 */

/**
 * Configuration for the backend server
 */
export interface ServerConfig {
	port: number;
	maxFileBytes: number;
	databaseUrl: string | null;
	/** Results kept by the in-memory cache when no database is configured */
	memoryCacheEntries: number;
}

/**
 * Configuration for the OpenAI client
 */
export interface OpenAIConfig {
	apiKey: string;
	baseURL: string;
	model: string;
}

/**
 * JPEG encoding profile applied to each rendered page
 */
export interface ImageProfile {
	name: 'standard' | 'light';
	/** Maximum image width in pixels; wider pages are scaled down */
	maxWidth: number;
	/** JPEG quality (0-100) */
	quality: number;
}

/**
 * Options for opening a document for rasterization
 */
export interface RasterOptions {
	/** Rendering resolution (72 = 1:1 with PDF points) */
	dpi: number;
	/** MIME type of the input, used by mupdf to pick a handler (default: application/pdf) */
	mimeType?: string;
}

/**
 * Rasterized document: pages are rendered on demand so a batch can be
 * re-encoded with a lighter profile
 */
export interface PageSource {
	pageCount: number;
	/** Render a page (0-indexed) to a base64 JPEG data URL */
	renderPage: (index: number, profile: ImageProfile) => string;
}

/**
 * A rendered page ready to be sent to the model
 */
export interface PageImage {
	pageNumber: number; // 1-indexed, relative to the whole document
	url: string;
}
