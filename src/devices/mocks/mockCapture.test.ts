import { describe, it, expect, vi } from 'vitest';
import { MockCaptureDevice } from './mockCapture';
import type { DetectionSink } from '../capture';

describe('MockCaptureDevice', () => {
  it('only delivers batches while armed', () => {
    const capture = new MockCaptureDevice();
    const sink: DetectionSink = { handleDetectionBatch: vi.fn(), handleSetupFailed: vi.fn() };
    capture.connect(sink);
    const batch = [{ typeTag: 'QR', content: 'A', bounds: { x: 0, y: 0, width: 1, height: 1 } }];

    expect(capture.emit(batch)).toBe(false);
    capture.armDetector(null);
    expect(capture.emit(batch)).toBe(true);
    capture.disarmDetector();
    expect(capture.emit(batch)).toBe(false);
    expect(sink.handleDetectionBatch).toHaveBeenCalledTimes(1);
    expect(capture.calls).toEqual(['arm', 'disarm']);
  });

  it('throws once from armDetector when failArm is set', () => {
    const capture = new MockCaptureDevice({ failArm: true });
    expect(() => capture.armDetector(null)).toThrow('Injected: no video input');
    expect(() => capture.armDetector(null)).not.toThrow();
    expect(capture.armCount).toBe(1);
  });
});
