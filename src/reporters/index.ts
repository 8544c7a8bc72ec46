/**
 * Reporters Module
 *
 * Export all reporting functionality for external use
 */

import type { AnalysisResult, OutputFormat } from '../types.js';
import { formatTextReport } from './text-reporter.js';
import { formatJsonReport } from './json-reporter.js';
import { formatGithubReport } from './github-reporter.js';

export type ReportFormatter = (result: AnalysisResult, verbose?: boolean) => string;

const FORMATTERS: Record<OutputFormat, ReportFormatter> = {
  text: formatTextReport,
  json: formatJsonReport,
  github: result => formatGithubReport(result),
};

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'github'];

export function getFormatter(format: OutputFormat): ReportFormatter {
  return FORMATTERS[format];
}

export {
  formatTextReport,
  endpointHeader,
  describeOccurrence,
  formatSummary,
} from './text-reporter.js';

export {
  buildJsonReport,
  formatJsonReport,
  type JsonReport,
  type JsonEndpoint,
  type JsonOccurrence,
} from './json-reporter.js';

export { formatGithubReport } from './github-reporter.js';

export { printTerminalReport, coloredHeader, type TerminalOptions } from './terminal-reporter.js';

export { formatEndpointListing } from './endpoint-listing.js';

export {
  buildSuggestions,
  formatSuggestions,
  type Suggestion,
  type SuggestionFormat,
} from './suggestions.js';
