/**
 * pqcscan - Output Formatters
 */

export { renderOutput, type OutputFormat, type RenderOptions, type RenderedOutput } from './render.js';
export { formatReport, formatDiagnostic } from './text.js';
export { toSarif, IMPORT_RULES, CALL_RULE, type SarifOutput, type SarifResult, type SarifRule } from './sarif.js';
export {
  generateAnnotations,
  formatAnnotation,
  printAnnotations,
  annotationsToStrings,
  escapeData,
  escapeProperty,
  type Annotation,
  type AnnotationOptions,
} from './annotations.js';
