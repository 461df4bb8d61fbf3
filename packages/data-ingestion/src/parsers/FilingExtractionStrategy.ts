/**
 * Label-proximity extraction for financial filings (Form 990 style).
 * Layouts drift between filing years, so the label synonyms and value rules are
 * data handed to the strategy rather than fixed parsing code.
 */

export type FilingValueKind = 'amount' | 'count' | 'text' | 'ein';

export interface FilingFieldRule {
  field: string;
  labels: string[];
  kind: FilingValueKind;
  required: boolean;
}

export interface ProgramServiceLine {
  code: string;
  name: string;
  expenses: number | null;
  grants: number | null;
  revenue: number | null;
}

export interface FilingSummary {
  fields: Record<string, string | number | null>;
  missingLabels: string[];
}

export interface FilingExtractionStrategy {
  readonly name: string;
  extractTaxYear(pages: string[], fileName: string): number | null;
  extractSummary(pages: string[]): FilingSummary;
  extractProgramLines(pages: string[]): ProgramServiceLine[];
}

export const DEFAULT_FILING_RULES: FilingFieldRule[] = [
  { field: 'organization_name', labels: ['Name of organization'], kind: 'text', required: false },
  { field: 'ein', labels: ['Employer identification number'], kind: 'ein', required: false },
  { field: 'contributions_and_grants', labels: ['Contributions and grants'], kind: 'amount', required: true },
  { field: 'program_service_revenue', labels: ['Program service revenue'], kind: 'amount', required: true },
  { field: 'investment_income', labels: ['Investment income'], kind: 'amount', required: true },
  { field: 'other_revenue', labels: ['Other revenue'], kind: 'amount', required: true },
  { field: 'total_revenue', labels: ['Total revenue'], kind: 'amount', required: true },
  {
    field: 'grants_and_similar_paid',
    labels: ['Grants and similar amounts paid'],
    kind: 'amount',
    required: true,
  },
  {
    field: 'salaries_and_wages',
    labels: ['Salaries, other compensation, employee benefits', 'Salaries and wages'],
    kind: 'amount',
    required: true,
  },
  { field: 'total_expenses', labels: ['Total expenses'], kind: 'amount', required: true },
  { field: 'revenue_less_expenses', labels: ['Revenue less expenses'], kind: 'amount', required: false },
  { field: 'total_assets', labels: ['Total assets'], kind: 'amount', required: true },
  { field: 'total_liabilities', labels: ['Total liabilities'], kind: 'amount', required: true },
  { field: 'net_assets', labels: ['Net assets or fund balances'], kind: 'amount', required: true },
  { field: 'employees_count', labels: ['Total number of individuals employed'], kind: 'count', required: false },
  { field: 'volunteers_count', labels: ['Total number of volunteers'], kind: 'count', required: false },
];

const AMOUNT_TOKEN = /^(\()?\$?(\d{1,3}(?:,\d{3})+|\d+)(\.\d*)?(\))?$/;
const COUNT_TOKEN = /^(\d{1,3}(?:,\d{3})+|\d+)$/;
const EIN_PATTERN = /\b(\d{2}-\d{7})\b/;
const PROGRAM_LINE = /^\s*(4[a-d])\b/i;
// "12 Total revenue", "4a (Code: )": the start of another form line
const LINE_NUMBER = /^\d{1,2}[a-z]?\s/i;
const PLAIN_INTEGER = /^\d+$/;

/**
 * Parse a filing amount: thousands separators, a trailing period ("52,185,551."),
 * a leading "$" and parentheses for negatives
 */
export function parseAmount(token: string): number | null {
  const match = AMOUNT_TOKEN.exec(token.trim());
  if (!match) {
    return null;
  }
  const [, open, digits, fraction, close] = match;
  const decimals = fraction && fraction.length > 1 ? fraction : '';
  const value = Number(`${digits.replace(/,/g, '')}${decimals}`);
  return open && close ? -value : value;
}

// Bare integers ("8", "2022") are line numbers and years, not amounts
function isAmountToken(token: string): boolean {
  const match = AMOUNT_TOKEN.exec(token);
  if (!match || Boolean(match[1]) !== Boolean(match[4])) {
    return false;
  }
  return token.includes(',') || token.includes('$') || match[3] !== undefined;
}

function normalizeSpace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function tokens(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

// Value columns close the line; plain integers only count there
function trailingValues(items: string[]): string[] {
  let start = items.length;
  while (start > 0 && (isAmountToken(items[start - 1]) || PLAIN_INTEGER.test(items[start - 1]))) {
    start--;
  }
  return items.slice(start);
}

function last(items: string[]): string | undefined {
  return items.length > 0 ? items[items.length - 1] : undefined;
}

export class LabelProximityStrategy implements FilingExtractionStrategy {
  readonly name = 'label-proximity';
  private readonly rules: FilingFieldRule[];
  private readonly programNames: Record<string, string>;

  constructor(options: { rules?: FilingFieldRule[]; extraLabels?: Record<string, string[]>; programNames?: Record<string, string> } = {}) {
    const extraLabels = options.extraLabels ?? {};
    this.rules = (options.rules ?? DEFAULT_FILING_RULES).map((rule) => ({
      ...rule,
      labels: [...rule.labels, ...(extraLabels[rule.field] ?? [])],
    }));
    this.programNames = options.programNames ?? {};
  }

  extractTaxYear(pages: string[], fileName: string): number | null {
    const text = pages.join('\n');
    const formYear = /Form\s+990\s*\((\d{4})\)/i.exec(text);
    if (formYear) {
      return Number(formYear[1]);
    }
    const calendarYear = /calendar\s+year\s+(\d{4})/i.exec(text);
    if (calendarYear) {
      return Number(calendarYear[1]);
    }
    const fromName = /(19|20)\d{2}/.exec(fileName);
    return fromName ? Number(fromName[0]) : null;
  }

  extractSummary(pages: string[]): FilingSummary {
    const lines = this.lines(pages);
    const fields: FilingSummary['fields'] = {};
    const missingLabels: string[] = [];

    for (const rule of this.rules) {
      const value = this.findValue(lines, rule);
      fields[rule.field] = value;
      if (value === null && rule.required) {
        missingLabels.push(rule.field);
      }
    }

    if (fields.ein === null) {
      fields.ein = EIN_PATTERN.exec(lines.join('\n'))?.[1] ?? null;
    }

    return { fields, missingLabels };
  }

  extractProgramLines(pages: string[]): ProgramServiceLine[] {
    const lines = this.lines(pages);
    const programs: ProgramServiceLine[] = [];
    const seen = new Set<string>();

    for (let i = 0; i < lines.length; i++) {
      const start = PROGRAM_LINE.exec(lines[i]);
      if (!start) continue;

      const code = start[1].toLowerCase();
      if (seen.has(code)) continue;

      // The amounts can wrap onto the next lines, up to the next program line
      const block = [lines[i]];
      for (let j = i + 1; j < lines.length && j <= i + 3 && !PROGRAM_LINE.test(lines[j]); j++) {
        block.push(lines[j]);
      }
      const text = block.join(' ');

      const expenses = this.amountAfter(text, /Expens\s*es\s*\$?\s*(\(?[\d,]+\.?\d*\)?)/i);
      const grants = this.amountAfter(text, /grants\s+of\s*\$?\s*(\(?[\d,]+\.?\d*\)?)/i);
      const revenue = this.amountAfter(text, /Revenue\s*\$?\s*(\(?[\d,]+\.?\d*\)?)/i);
      if (expenses === null && grants === null && revenue === null) continue;

      seen.add(code);
      programs.push({
        code,
        name: this.programNames[code] ?? `Program service ${code}`,
        expenses,
        grants,
        revenue,
      });
    }

    return programs;
  }

  // A line that belongs to another label never supplies this label's value
  private isLabelLine(line: string): boolean {
    if (LINE_NUMBER.test(line)) {
      return true;
    }
    const lower = line.toLowerCase();
    return this.rules.some((rule) => rule.labels.some((label) => lower.includes(label.toLowerCase())));
  }

  private lines(pages: string[]): string[] {
    return pages.flatMap((page) => page.split(/\r?\n/)).map(normalizeSpace);
  }

  /**
   * First line carrying one of the rule's labels that also yields a value.
   * The value is the last value token after the label (the current-year
   * column), else the first one on the next non-empty line unless that line
   * is another label's.
   */
  private findValue(lines: string[], rule: FilingFieldRule): string | number | null {
    for (let i = 0; i < lines.length; i++) {
      const lower = lines[i].toLowerCase();
      for (const label of rule.labels) {
        const at = lower.indexOf(label.toLowerCase());
        if (at < 0) continue;

        const rest = lines[i].slice(at + label.length);
        const following = lines.slice(i + 1).find((line) => line.length > 0) ?? '';
        const next = this.isLabelLine(following) ? '' : following;
        const value = this.valueFrom(rest, next, rule.kind);
        if (value !== null) {
          return value;
        }
      }
    }
    return null;
  }

  private valueFrom(rest: string, next: string, kind: FilingValueKind): string | number | null {
    switch (kind) {
      case 'amount': {
        const onLine = tokens(rest);
        const token =
          last(trailingValues(onLine)) ?? last(onLine.filter(isAmountToken)) ?? tokens(next).find(isAmountToken);
        return token ? parseAmount(token) : null;
      }
      case 'count': {
        const token =
          last(tokens(rest).filter((item) => COUNT_TOKEN.test(item))) ??
          tokens(next).find((item) => COUNT_TOKEN.test(item));
        return token ? Number(token.replace(/,/g, '')) : null;
      }
      case 'ein':
        return EIN_PATTERN.exec(rest)?.[1] ?? EIN_PATTERN.exec(next)?.[1] ?? null;
      case 'text': {
        const text = rest.replace(/^[\s:.\-]+/, '').trim();
        return text || next || null;
      }
    }
  }

  private amountAfter(text: string, pattern: RegExp): number | null {
    const match = pattern.exec(text);
    return match ? parseAmount(match[1]) : null;
  }
}
