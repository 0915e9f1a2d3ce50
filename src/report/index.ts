/**
 * Report Module
 */

export {
  renderReport,
  resolveWidth,
  formatTime,
  sizeInKilobytes,
  DEFAULT_WIDTH,
  MIN_WIDTH,
  type RenderOptions,
  type ReportFormat,
} from "./render.js";
