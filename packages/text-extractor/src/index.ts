export {
  TextExtractionClient,
  type PageRasterizer,
  type TextExtractionClientOptions,
} from './core/text-extraction-client';
export {
  PageRenderer,
  type PageRenderResult,
  type PageRendererOptions,
} from './processors/page-renderer';
export { TextExtractionError } from './errors/text-extraction-error';
export {
  IMAGE_EXTENSIONS,
  PAGE_RENDERER,
  TEXT_EXTRACTION,
} from './config/constants';
