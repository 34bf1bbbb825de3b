export { normalizeSeverity, parseBuildDiagnostics } from "./diagnostics/parser.js";
export { filterDiagnosticsForFile, summarizeDiagnostics } from "./diagnostics/filter.js";
