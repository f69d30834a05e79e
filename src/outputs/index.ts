export {
  createFormatters,
  formatClock,
  formatJson,
  formatPretty,
  formatSrt,
  formatText,
  formatVtt,
  getFormatter,
  isOutputFormat,
  OUTPUT_FORMATS,
} from './formatters';
export type { Formatter } from './formatters';
export { appendJsonl, escapeCsv, writeCsv, writeJsonl } from './files';
