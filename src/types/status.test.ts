import { describe, it, expect } from '@jest/globals';
import { StatusModel, type StatusJson } from './status';

const PRINT_DATA = {
  layer_count: 100,
  used_material: 12.5,
  print_time: 600,
  file_data: { name: 'part.ctb', path: 'jobs/part.ctb', location_category: 'Local' },
};

function model(overrides: Partial<StatusJson> = {}): StatusModel {
  const json: StatusJson = {
    status: 'Printing',
    paused: false,
    layer: 12,
    print_data: PRINT_DATA,
    physical_state: { z: 0.6, curing: false },
    ...overrides,
  };
  return StatusModel.fromJson({ ...json });
}

describe('StatusModel', () => {
  it('derives progress and elapsed time', () => {
    const status = model();

    expect(status.isPrinting).toBe(true);
    expect(status.progress).toBe(0.12);
    expect(status.layerCount).toBe(100);
    expect(status.formattedElapsedPrintTime).toBe('00:10:00');
    expect(status.displayLabel(false, false)).toBe('Printing');
  });

  it('clamps progress and reads zero without a layer count', () => {
    expect(model({ layer: 150 }).progress).toBe(1);
    expect(model({ print_data: { ...PRINT_DATA, layer_count: 0 } }).progress).toBe(0);
  });

  it('reads a job without a layer as canceled', () => {
    const status = model({ status: 'Idle', layer: null });

    expect(status.isCanceled).toBe(true);
    expect(status.isPrinting).toBe(false);
    expect(status.hasCanceledJob).toBe(true);
    expect(status.displayLabel(false, false)).toBe('Canceled');
  });

  it('needs a job or a latch for a canceled job', () => {
    expect(model({ status: 'Idle', layer: null, print_data: null }).hasCanceledJob).toBe(false);
    expect(model({ status: 'Idle', layer: null, print_data: null, cancel_latched: true }).hasCanceledJob).toBe(true);
  });

  it('labels finished, transitional, paused and curing states', () => {
    expect(model({ status: 'Idle', layer: 100 }).displayLabel(false, false)).toBe('Finished');
    expect(model().displayLabel(true, false)).toBe('Canceling');
    expect(model().displayLabel(false, true)).toBe('Pausing');
    expect(model({ status: 'Paused', paused: true }).displayLabel(false, true)).toBe('Paused');
    expect(model({ physical_state: { z: 1, curing: true } }).displayLabel(false, false)).toBe('Curing');
  });

  it('tolerates missing and mistyped fields', () => {
    const status = StatusModel.fromJson({ layer: 'x', physical_state: 'bad' });

    expect(status.status).toBe('Unknown');
    expect(status.layer).toBeNull();
    expect(status.physicalState).toEqual({ z: 0, curing: false });
    expect(status.printData).toBeNull();
  });

  it('serializes back to the wire shape and is frozen', () => {
    const json: StatusJson = {
      status: 'Idle',
      paused: false,
      layer: null,
      print_data: PRINT_DATA,
      physical_state: { z: 0, curing: false },
      cancel_latched: true,
      pause_latched: false,
      finished: false,
      device_status_message: 'Stopping',
    };
    const status = StatusModel.fromJson({ ...json });

    expect(status.toJSON()).toEqual(json);
    expect(Object.isFrozen(status)).toBe(true);
  });
});
