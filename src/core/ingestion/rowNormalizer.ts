/**
 * Turns rows of already-parsed spreadsheet cells into candidate IntentRecords.
 * Handles: header variants ("Intent ID", "intent-id"), delimited list columns,
 * numeric strings for priority/threshold, and trailing blank rows.
 */
import { DEFAULT_PRIORITY, normalizeKeywords } from '../intents/IntentRecord.js';
import type { IntentRecord, ValidationIssue } from '../intents/types.js';

export type SheetCell = string | number | boolean | null | undefined;
export type SheetRow = Readonly<Record<string, SheetCell>>;

export interface RowNormalizerOptions {
  listDelimiter: string;
}

export interface NormalizedRows {
  records: IntentRecord[];
  /** Structural problems; when non-empty the whole batch must be rejected. */
  errors: ValidationIssue[];
}

type Column =
  | 'intent_id'
  | 'intent_name'
  | 'category'
  | 'agent_routing'
  | 'priority'
  | 'description_short'
  | 'training_utterances'
  | 'keywords'
  | 'disambiguation_prompt'
  | 'confidence_threshold';

const COLUMNS: readonly Column[] = [
  'intent_id',
  'intent_name',
  'category',
  'agent_routing',
  'priority',
  'description_short',
  'training_utterances',
  'keywords',
  'disambiguation_prompt',
  'confidence_threshold',
];

function canonicalHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

const COLUMN_NAMES: ReadonlySet<string> = new Set(COLUMNS);

function isColumn(value: string): value is Column {
  return COLUMN_NAMES.has(value);
}

function isBlank(cell: SheetCell): boolean {
  return cell === null || cell === undefined || (typeof cell === 'string' && cell.trim() === '');
}

class RowReader {
  readonly errors: ValidationIssue[] = [];
  private readonly cells = new Map<Column, SheetCell>();

  constructor(
    row: SheetRow,
    private readonly index: number,
    private readonly delimiter: string
  ) {
    for (const [header, cell] of Object.entries(row)) {
      const column = canonicalHeader(header);
      if (isColumn(column)) this.cells.set(column, cell);
    }
  }

  get intentId(): string | null {
    const cell = this.cells.get('intent_id');
    return typeof cell === 'string' && cell.trim() ? cell.trim() : null;
  }

  isEmpty(): boolean {
    return [...this.cells.values()].every(isBlank);
  }

  fail(field: Column, message: string): void {
    this.errors.push({ intentId: this.intentId, field, message: `Row ${this.index}: ${message}`, row: this.index });
  }

  text(field: Column): string {
    const cell = this.cells.get(field);
    if (isBlank(cell)) {
      this.fail(field, `${field} is required`);
      return '';
    }
    if (typeof cell === 'string') return cell.trim();
    if (typeof cell === 'number') return String(cell);
    this.fail(field, `${field} must be text`);
    return '';
  }

  optionalText(field: Column): string | undefined {
    const cell = this.cells.get(field);
    if (isBlank(cell)) return undefined;
    if (typeof cell === 'string') return cell.trim();
    this.fail(field, `${field} must be text`);
    return undefined;
  }

  list(field: Column): string[] {
    const cell = this.cells.get(field);
    if (isBlank(cell)) return [];
    if (typeof cell !== 'string') {
      this.fail(field, `${field} must be text separated by "${this.delimiter}"`);
      return [];
    }
    return cell
      .split(this.delimiter)
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  optionalNumber(field: Column): number | undefined {
    const cell = this.cells.get(field);
    if (isBlank(cell)) return undefined;
    const value = typeof cell === 'string' ? Number(cell.trim()) : cell;
    if (typeof value !== 'number' || Number.isNaN(value)) {
      this.fail(field, `${field} must be a number, got "${String(cell)}"`);
      return undefined;
    }
    return value;
  }

  priority(): number {
    const value = this.optionalNumber('priority');
    if (value === undefined) return DEFAULT_PRIORITY;
    if (!Number.isInteger(value)) {
      this.fail('priority', `priority must be an integer, got "${String(this.cells.get('priority'))}"`);
      return DEFAULT_PRIORITY;
    }
    return value;
  }
}

export function normalizeRows(rows: readonly SheetRow[], options: RowNormalizerOptions): NormalizedRows {
  const records: IntentRecord[] = [];
  const errors: ValidationIssue[] = [];

  rows.forEach((row, index) => {
    const reader = new RowReader(row, index, options.listDelimiter);
    if (reader.isEmpty()) return;

    const record: IntentRecord = {
      intentId: reader.text('intent_id'),
      intentName: reader.text('intent_name'),
      category: reader.text('category'),
      agentRouting: reader.text('agent_routing'),
      priority: reader.priority(),
      descriptionShort: reader.text('description_short'),
      trainingUtterances: reader.list('training_utterances'),
      keywords: normalizeKeywords(reader.list('keywords')),
    };
    const disambiguationPrompt = reader.optionalText('disambiguation_prompt');
    if (disambiguationPrompt !== undefined) record.disambiguationPrompt = disambiguationPrompt;
    const confidenceThreshold = reader.optionalNumber('confidence_threshold');
    if (confidenceThreshold !== undefined) record.confidenceThreshold = confidenceThreshold;

    if (record.trainingUtterances.length === 0) {
      reader.fail('training_utterances', 'training_utterances must contain at least one utterance');
    }

    errors.push(...reader.errors);
    records.push(record);
  });

  return { records, errors };
}
