import { basename } from 'path';
import { SourceReader } from './SourceReader';
import { SourceReadError } from '../errors';
import { FileDetectionService } from '../utils/fileDetection';
import { getErrorMessage } from '../utils/errorUtils';
import type { SourceLocator, StagedRecord } from '../types';
import type { FilingExtractionStrategy, ProgramServiceLine } from './FilingExtractionStrategy';

// Null when the filing lists no program expenses
function programExpenses(programs: ProgramServiceLine[]): number | null {
  const amounts = programs.flatMap((program) => (program.expenses === null ? [] : [program.expenses]));
  if (amounts.length === 0) {
    return null;
  }
  return Math.round(amounts.reduce((sum, amount) => sum + amount, 0) * 100) / 100;
}

/**
 * Financial filing reader. One document per path; PDFs go through pdf-parse,
 * text exports are split into pages on form feeds. The `summary` section yields
 * one record per filing, `programs` one record per program service line.
 */
export class FilingReader extends SourceReader {
  constructor(
    locator: SourceLocator,
    private readonly strategy: FilingExtractionStrategy
  ) {
    super(locator);
  }

  async *read(): AsyncIterable<StagedRecord> {
    for (const path of this.locator.paths) {
      const pages = await this.readPages(path);
      const taxYear = this.strategy.extractTaxYear(pages, basename(path));

      if (this.locator.section === 'programs') {
        for (const program of this.strategy.extractProgramLines(pages)) {
          yield this.staged(
            {
              tax_year: taxYear,
              program_code: program.code,
              program_name: program.name,
              expenses: program.expenses,
              grants: program.grants,
              revenue: program.revenue,
            },
            { source: path, path: program.code }
          );
        }
        continue;
      }

      const summary = this.strategy.extractSummary(pages);
      yield this.staged(
        {
          tax_year: taxYear,
          fiscal_year: taxYear,
          ...summary.fields,
          program_services_expenses: programExpenses(this.strategy.extractProgramLines(pages)),
        },
        { source: path },
        summary.missingLabels
      );
    }
  }

  private async readPages(path: string): Promise<string[]> {
    const buffer = await this.readSourceFile(path);

    if (!FileDetectionService.isPdf(path)) {
      return this.decodeText(buffer, path).split('\f');
    }

    try {
      // Loaded on first use: only PDF sources need it
      const { default: pdfParse } = await import('pdf-parse');
      const pdfData = await pdfParse(buffer);
      return pdfData.text.split('\f');
    } catch (error) {
      throw new SourceReadError(`Cannot extract text from ${path}: ${getErrorMessage(error)}`, { source: path }, error);
    }
  }
}
