/**
 * Minimal single-strip Float32 GeoTIFF writer for tests
 */

export interface GeoTiffFixture {
  width: number;
  height: number;
  values: number[];
  /** Upper-left corner */
  originX: number;
  originY: number;
  cellSize: number;
  nodata?: string;
}

const ASCII = 2;
const SHORT = 3;
const LONG = 4;
const DOUBLE = 12;

type FieldType = typeof ASCII | typeof SHORT | typeof LONG | typeof DOUBLE;

const TYPE_SIZE: Record<FieldType, number> = { [ASCII]: 1, [SHORT]: 2, [LONG]: 4, [DOUBLE]: 8 };

interface Field {
  tag: number;
  type: FieldType;
  values: number[];
}

const align8 = (offset: number): number => Math.ceil(offset / 8) * 8;

function writeValue(view: DataView, offset: number, type: FieldType, value: number): void {
  if (type === ASCII) view.setUint8(offset, value);
  else if (type === SHORT) view.setUint16(offset, value, true);
  else if (type === LONG) view.setUint32(offset, value, true);
  else view.setFloat64(offset, value, true);
}

export function buildGeoTiff(fixture: GeoTiffFixture): Buffer {
  const { width, height, values } = fixture;
  const dataSize = width * height * 4;

  const fields: Field[] = [
    { tag: 256, type: SHORT, values: [width] },
    { tag: 257, type: SHORT, values: [height] },
    { tag: 258, type: SHORT, values: [32] },
    { tag: 259, type: SHORT, values: [1] },
    { tag: 262, type: SHORT, values: [1] },
    // StripOffsets, filled in once the layout is known
    { tag: 273, type: LONG, values: [0] },
    { tag: 277, type: SHORT, values: [1] },
    { tag: 278, type: SHORT, values: [height] },
    { tag: 279, type: LONG, values: [dataSize] },
    { tag: 284, type: SHORT, values: [1] },
    { tag: 339, type: SHORT, values: [3] },
    { tag: 33550, type: DOUBLE, values: [fixture.cellSize, fixture.cellSize, 0] },
    { tag: 33922, type: DOUBLE, values: [0, 0, 0, fixture.originX, fixture.originY, 0] },
  ];
  if (fixture.nodata !== undefined) {
    const text = `${fixture.nodata}\0`;
    fields.push({ tag: 42113, type: ASCII, values: Array.from(text, (char) => char.charCodeAt(0)) });
  }

  const ifdOffset = 8;
  let cursor = align8(ifdOffset + 2 + fields.length * 12 + 4);
  const extraOffsets = fields.map((field) => {
    const size = field.values.length * TYPE_SIZE[field.type];
    if (size <= 4) return null;
    const offset = cursor;
    cursor = align8(cursor + size);
    return offset;
  });
  const dataOffset = cursor;
  fields[5].values = [dataOffset];

  const buffer = new ArrayBuffer(dataOffset + dataSize);
  const view = new DataView(buffer);

  // "II", 42, first IFD
  view.setUint16(0, 0x4949, true);
  view.setUint16(2, 42, true);
  view.setUint32(4, ifdOffset, true);

  view.setUint16(ifdOffset, fields.length, true);
  fields.forEach((field, index) => {
    const entry = ifdOffset + 2 + index * 12;
    view.setUint16(entry, field.tag, true);
    view.setUint16(entry + 2, field.type, true);
    view.setUint32(entry + 4, field.values.length, true);

    const extra = extraOffsets[index];
    const target = extra ?? entry + 8;
    if (extra !== null) view.setUint32(entry + 8, extra, true);
    field.values.forEach((value, i) => writeValue(view, target + i * TYPE_SIZE[field.type], field.type, value));
  });
  view.setUint32(ifdOffset + 2 + fields.length * 12, 0, true);

  values.forEach((value, i) => view.setFloat32(dataOffset + i * 4, value, true));

  return Buffer.from(buffer);
}
