import { describe, it, expect } from '@jest/globals';
import {
  parseLayerHeight,
  parseNanoFile,
  parsePreviewFlag,
  parsePrintTime,
  parseVolume,
  toFileEntry,
  toFileMetadata,
} from './nano-file';

describe('nano-file', () => {
  describe('parsePrintTime', () => {
    it('reads durations, numbers and unit strings', () => {
      expect(parsePrintTime('~1:02:03')).toBe(3723);
      expect(parsePrintTime(600)).toBe(600);
      expect(parsePrintTime('90 s')).toBe(90);
      expect(parsePrintTime(null)).toBeNull();
      expect(parsePrintTime('n/a')).toBeNull();
    });
  });

  describe('parseVolume', () => {
    it('converts by unit suffix', () => {
      expect(parseVolume('12.5ml')).toBe(12.5);
      expect(parseVolume('2 L')).toBe(2000);
      expect(parseVolume('500 µl')).toBe(0.5);
      expect(parseVolume('3 cc')).toBe(3);
    });

    it('reads large unitless strings as microlitres', () => {
      expect(parseVolume('2500')).toBe(2.5);
      expect(parseVolume('25')).toBe(25);
      expect(parseVolume(2500)).toBe(2500);
      expect(parseVolume('')).toBeNull();
    });
  });

  describe('parseLayerHeight', () => {
    it('reads millimetres and microns', () => {
      expect(parseLayerHeight(0.05)).toBe(0.05);
      expect(parseLayerHeight(50)).toBe(0.05);
      expect(parseLayerHeight('50 µm')).toBe(0.05);
      expect(parseLayerHeight('0.05mm')).toBe(0.05);
      expect(parseLayerHeight(50, true)).toBe(0.05);
      expect(parseLayerHeight(null)).toBeNull();
    });
  });

  it('reads preview flags in any form', () => {
    expect(parsePreviewFlag('yes')).toBe(true);
    expect(parsePreviewFlag('1')).toBe(true);
    expect(parsePreviewFlag('no')).toBe(false);
    expect(parsePreviewFlag(0)).toBe(false);
    expect(parsePreviewFlag(undefined)).toBe(false);
  });

  describe('parseNanoFile', () => {
    const plate = parseNanoFile({
      Path: 'jobs/part.ctb',
      LayerCount: 200,
      PrintTime: '~0:30:00',
      UsedMaterial: '12.5ml',
      LayerThickness: 50,
      PlateID: 7,
      Preview: 1,
    });

    it('fills derived fields', () => {
      expect(plate).toEqual({
        path: 'jobs/part.ctb',
        name: 'part.ctb',
        layerCount: 200,
        printTime: 1800,
        lastModified: null,
        parentPath: 'jobs',
        fileSize: null,
        materialName: 'N/A',
        usedMaterial: 12.5,
        layerHeight: 0.05,
        locationCategory: 'Local',
        plateId: 7,
        previewAvailable: true,
      });
    });

    it('uses the name as path when only a name is given', () => {
      const file = parseNanoFile({ name: 'a.ctb' });

      expect(file.path).toBe('a.ctb');
      expect(file.parentPath).toBe('');
      expect(file.usedMaterial).toBe(0);
    });

    it('renders a file listing row', () => {
      expect(toFileEntry(plate)).toEqual({
        file_data: {
          path: 'jobs/part.ctb',
          name: 'part.ctb',
          last_modified: 0,
          parent_path: 'jobs',
          file_size: null,
        },
        location_category: 'Local',
        material_name: 'N/A',
        used_material: 12.5,
        print_time: 1800,
        print_time_formatted: '00:30:00',
        layer_count: 200,
        layer_height: 0.05,
        plate_id: 7,
        preview_available: true,
      });
    });

    it('renders metadata without a formatted time when unknown', () => {
      const metadata = toFileMetadata(parseNanoFile({ path: 'a.ctb' }));

      expect(metadata.print_time).toBe(0);
      expect(metadata).not.toHaveProperty('print_time_formatted');
      expect(metadata.plate_id).toBeNull();
    });
  });
});
