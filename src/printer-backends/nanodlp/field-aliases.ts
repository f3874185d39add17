/**
 * @fileoverview Candidate keys for each attribute of a NanoDLP payload.
 *
 * NanoDLP builds disagree on key names and casing. Each list is tried in
 * order and the first present key wins, so the order is part of the
 * contract. New quirks go here as extra entries, not as code branches.
 */

export const STATUS_ALIASES = {
  file: [
    'file',
    'File',
    'plate',
    'Plate',
    'file_data',
    'FileData',
    'fileData',
    'current_file',
    'CurrentFile',
    'job',
    'Job',
  ],
  printing: ['Printing', 'printing'],
  started: ['Started', 'started'],
  paused: ['Paused', 'paused'],
  statusMessage: ['Status', 'status'],
  currentHeight: ['CurrentHeight', 'current_height'],
  layerId: ['LayerID', 'layer_id'],
  layersCount: ['LayersCount', 'layers_count'],
  resinLevel: ['resin', 'ResinLevelMm', 'resin_level_mm'],
  temperature: ['temp'],
  mcuTemperature: ['mcu'],
  curing: ['Curing', 'curing'],
  stateCode: ['State'],
  plateId: ['PlateID', 'plate_id', 'Plateid', 'plateId'],
  /** Height fields in unmarked units, normalized by magnitude */
  z: ['z', 'Z', 'position_z', 'height'],
} as const;

export const FILE_ALIASES = {
  path: ['path', 'Path', 'file_path', 'File'],
  name: ['name', 'Name'],
  layerCount: ['layer_count', 'LayerCount', 'layerCount'],
  printTime: ['print_time', 'printTime', 'PrintTime'],
  lastModified: ['last_modified', 'LastModified', 'Updated', 'UpdatedOn', 'CreatedDate'],
  parentPath: ['parent_path', 'parentPath'],
  fileSize: ['file_size', 'FileSize', 'size', 'Size'],
  materialName: ['ProfileName'],
  usedMaterial: [
    'used_material',
    'usedMaterial',
    'UsedMaterial',
    'UsedMaterialMl',
    'UsedResin',
    'ResinVolume',
    'UsedVolume',
    'Volume',
    'TotalSolidArea',
  ],
  layerHeight: ['layer_height', 'layerHeight', 'PlateHeight'],
  layerHeightMicrons: ['LayerThickness', 'ZRes'],
  locationCategory: ['location_category', 'location'],
  plateId: ['PlateID', 'plate_id'],
  preview: ['Preview', 'preview', 'HasPreview'],
} as const;

/** Keys of the `/status` payload used to build the config summary */
export const CONFIG_ALIASES = {
  hostname: ['Hostname', 'hostname'],
  ip: ['IP', 'ip'],
  status: ['Status', 'status'],
  build: ['Build', 'build'],
  version: ['Version', 'version'],
  disk: ['disk', 'Disk'],
  wifi: ['Wifi', 'wifi'],
} as const;

/** Payload fields too large to keep around between polls */
export const DISCARDED_STATUS_KEYS = ['FillAreas'] as const;

/** Keys whose presence means the device exposes Z-axis control */
export const Z_CONTROL_KEYS = ['CurrentHeight', 'physical_state'] as const;
