export {
  renderReport,
  stripMarkup,
  formatTimestamp,
  resolveItemName,
  escapeHtml,
} from './ReportFormatter'
