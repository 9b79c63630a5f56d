import { PackageRecord } from './types';

export type CycleKind = 'scan' | 'check';

export type InventoryEvent =
  | { type: 'scan_completed'; records: readonly PackageRecord[] }
  | { type: 'updates_found'; records: readonly PackageRecord[] }
  | { type: 'update_started'; ids: readonly string[]; isBulk: boolean }
  | { type: 'update_result'; id: string; success: boolean; errorText?: string }
  | { type: 'bulk_update_result'; ids: readonly string[]; success: boolean; errorText?: string }
  | { type: 'cycle_failed'; cycle: CycleKind; message: string }
  | { type: 'session_summary'; total: number; updatableCount: number; appliedCount: number };

export interface EventSink {
  emit(event: InventoryEvent): void;
}

export const nullSink: EventSink = {
  emit() {},
};

export function fanOut(...sinks: EventSink[]): EventSink {
  return {
    emit(event) {
      for (const sink of sinks) sink.emit(event);
    },
  };
}
