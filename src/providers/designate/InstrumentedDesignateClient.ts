/**
 * Designate client decorator reporting call volume, failures and latency
 */
import type { ApiCallRecorder } from '../../core/Metrics.js';
import type {
  DesignateRecordSet,
  DesignateZone,
  RecordSetCreateInput,
  RecordSetUpdateInput,
} from '../../types/index.js';
import type { DesignateClientInterface } from './DesignateClient.js';

export class InstrumentedDesignateClient implements DesignateClientInterface {
  constructor(
    private readonly inner: DesignateClientInterface,
    private readonly recorder: ApiCallRecorder
  ) {}

  forEachZone(handler: (zone: DesignateZone) => void, signal?: AbortSignal): Promise<void> {
    return this.track('list_zones', () => this.inner.forEachZone(handler, signal));
  }

  forEachRecordSet(
    zoneId: string,
    handler: (recordSet: DesignateRecordSet) => void,
    signal?: AbortSignal
  ): Promise<void> {
    return this.track('list_recordsets', () => this.inner.forEachRecordSet(zoneId, handler, signal));
  }

  createRecordSet(zoneId: string, input: RecordSetCreateInput, signal?: AbortSignal): Promise<string> {
    return this.track('create_recordset', () => this.inner.createRecordSet(zoneId, input, signal));
  }

  updateRecordSet(
    zoneId: string,
    recordSetId: string,
    input: RecordSetUpdateInput,
    signal?: AbortSignal
  ): Promise<void> {
    return this.track('update_recordset', () => this.inner.updateRecordSet(zoneId, recordSetId, input, signal));
  }

  deleteRecordSet(zoneId: string, recordSetId: string, signal?: AbortSignal): Promise<void> {
    return this.track('delete_recordset', () => this.inner.deleteRecordSet(zoneId, recordSetId, signal));
  }

  private async track<T>(method: string, call: () => Promise<T>): Promise<T> {
    const started = process.hrtime.bigint();
    this.recorder.recordCall(method);
    try {
      return await call();
    } catch (error) {
      this.recorder.recordFailure(method);
      throw error;
    } finally {
      const elapsed = Number(process.hrtime.bigint() - started) / 1e9;
      this.recorder.observeLatency(method, elapsed);
    }
  }
}
