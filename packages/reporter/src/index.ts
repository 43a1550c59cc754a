export {
  CHARTS_DIR,
  MARKDOWN_REPORT_FILE,
  RAW_RESULTS_FILE,
  TEXT_REPORT_FILE,
  runDirectoryName,
  writeRunArtifacts,
  type ArtifactOptions,
  type RunArtifacts,
} from './writer.js';
export { renderTextReport } from './render/text.js';
export { renderMarkdownReport } from './render/markdown.js';
export {
  HEADLINE_METRICS,
  buildChartGroups,
  niceCeiling,
  renderBarChart,
  renderCategoryCharts,
  svgChartRenderer,
  type ChartFile,
  type ChartGroup,
  type ChartRenderer,
} from './charts/svg.js';
