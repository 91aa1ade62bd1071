import type { ToolCallRecord } from '../../../shared/types.js';

type RecordPatch = Partial<Omit<ToolCallRecord, 'id' | 'sequence' | 'tool' | 'input'>>;

/**
 * Dispatch-ordered log of tool call records for one turn. Records are frozen
 * snapshots; every status change replaces the snapshot and is reported to
 * the listener, so observers never see a record mutate.
 */
export class ToolCallLog {
  private readonly records: ToolCallRecord[] = [];
  private readonly positions = new Map<string, number>();
  private readonly listener?: (record: ToolCallRecord) => void;

  constructor(listener?: (record: ToolCallRecord) => void) {
    this.listener = listener;
  }

  begin(
    id: string,
    tool: string,
    input: Record<string, unknown>,
    extra: Pick<ToolCallRecord, 'expansionOf' | 'attempt'> = {}
  ): ToolCallRecord {
    if (this.positions.has(id)) {
      throw new Error(`Duplicate tool call id ${id}`);
    }
    const record: ToolCallRecord = Object.freeze({
      id,
      sequence: this.records.length + 1,
      tool,
      input: Object.freeze({ ...input }),
      status: 'pending',
      ...extra
    });
    this.positions.set(id, this.records.length);
    this.records.push(record);
    this.listener?.(record);
    return record;
  }

  update(id: string, patch: RecordPatch): ToolCallRecord {
    const position = this.positions.get(id);
    if (position === undefined) {
      throw new Error(`Unknown tool call id ${id}`);
    }
    const next: ToolCallRecord = Object.freeze({ ...this.records[position], ...patch });
    this.records[position] = next;
    this.listener?.(next);
    return next;
  }

  get(id: string): ToolCallRecord | undefined {
    const position = this.positions.get(id);
    return position === undefined ? undefined : this.records[position];
  }

  snapshot(): readonly ToolCallRecord[] {
    return Object.freeze([...this.records]);
  }

  get size(): number {
    return this.records.length;
  }
}
