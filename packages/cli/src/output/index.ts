export { OutputRenderer, formatProgress, toJsonOutput } from './renderer';
export type { JsonOutput, JsonResult, RenderContext, StatusStream } from './renderer';
export { formatTable } from './table';
