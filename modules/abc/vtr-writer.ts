import fs from "node:fs/promises";
import path from "node:path";
import type { TVtkDataEncoding } from "../../shared/abc-flow";
import { withIoContext } from "./errors";
import type { VectorFieldSnapshot } from "./field";
import type { CubeGrid } from "./grid";

export const VTR_EXTENSION = ".vtr";

const HEADER_BYTES = 8;
const FLOAT32_BYTES = 4;

interface DataArrayBlock {
  name: string;
  components: number;
  values: Float32Array;
}

export interface TimestepWriteRequest {
  outDir: string;
  basename: string;
  step: number;
  grid: CubeGrid;
  field: VectorFieldSnapshot;
  encoding?: TVtkDataEncoding;
}

export interface TimestepWriteResult {
  fileName: string;
  filePath: string;
  bytes: number;
}

export const stepFileStem = (basename: string, step: number) =>
  `${basename}_${String(step).padStart(4, "0")}`;

export const stepFileName = (basename: string, step: number) =>
  `${stepFileStem(basename, step)}${VTR_EXTENSION}`;

/** Interleaves the three components per point: vx0 vy0 vz0 vx1 ... */
export const interleaveVector = ({ vx, vy, vz }: VectorFieldSnapshot): Float32Array => {
  const out = new Float32Array(vx.length * 3);
  for (let i = 0; i < vx.length; i += 1) {
    out[3 * i] = vx[i];
    out[3 * i + 1] = vy[i];
    out[3 * i + 2] = vz[i];
  }
  return out;
};

const extentOf = (grid: CubeGrid) =>
  grid.dims.map((size) => `0 ${size - 1}`).join(" ");

const blocksFor = (grid: CubeGrid, field: VectorFieldSnapshot) => {
  const velocity: DataArrayBlock = { name: "velocity", components: 3, values: interleaveVector(field) };
  const coordinates: DataArrayBlock[] = (["x", "y", "z"] as const).map((axis, i) => ({
    name: `${axis}_coordinates`,
    components: 1,
    values: grid.axes[i],
  }));
  return { velocity, coordinates };
};

const formatAscii = (values: Float32Array) => Array.from(values, (v) => String(v)).join(" ");

const dataArrayTag = (block: DataArrayBlock, format: string, extra = "") =>
  `<DataArray type="Float32" Name="${block.name}" NumberOfComponents="${block.components}" format="${format}"${extra}`;

const encodeAppended = (blocks: DataArrayBlock[]): Buffer => {
  const total = blocks.reduce((sum, block) => sum + HEADER_BYTES + block.values.length * FLOAT32_BYTES, 0);
  const out = Buffer.alloc(total);
  let cursor = 0;
  for (const block of blocks) {
    out.writeBigUInt64LE(BigInt(block.values.length * FLOAT32_BYTES), cursor);
    cursor += HEADER_BYTES;
    for (let i = 0; i < block.values.length; i += 1) {
      out.writeFloatLE(block.values[i], cursor);
      cursor += FLOAT32_BYTES;
    }
  }
  return out;
};

/**
 * Serializes one snapshot as a VTK XML RectilinearGrid document.
 *
 * With `raw` encoding every DataArray points into a trailing AppendedData
 * section (UInt64 byte count, then little-endian Float32 payload), ordered
 * velocity, x, y, z. With `ascii` the values are written inline.
 */
export const encodeRectilinearGrid = (
  grid: CubeGrid,
  field: VectorFieldSnapshot,
  encoding: TVtkDataEncoding = "raw",
): Buffer => {
  const { velocity, coordinates } = blocksFor(grid, field);
  const extent = extentOf(grid);
  const ordered = [velocity, ...coordinates];

  const offsets = new Map<DataArrayBlock, number>();
  let offset = 0;
  for (const block of ordered) {
    offsets.set(block, offset);
    offset += HEADER_BYTES + block.values.length * FLOAT32_BYTES;
  }

  const arrayLines = (block: DataArrayBlock, indent: string): string[] => {
    if (encoding === "ascii") {
      return [
        `${indent}${dataArrayTag(block, "ascii")}>`,
        `${indent}  ${formatAscii(block.values)}`,
        `${indent}</DataArray>`,
      ];
    }
    return [`${indent}${dataArrayTag(block, "appended", ` offset="${offsets.get(block) ?? 0}"`)}/>`];
  };

  const lines = [
    `<?xml version="1.0"?>`,
    `<VTKFile type="RectilinearGrid" version="1.0" byte_order="LittleEndian" header_type="UInt64">`,
    `  <RectilinearGrid WholeExtent="${extent}">`,
    `    <Piece Extent="${extent}">`,
    `      <PointData Vectors="${velocity.name}">`,
    ...arrayLines(velocity, "        "),
    `      </PointData>`,
    `      <Coordinates>`,
    ...coordinates.flatMap((block) => arrayLines(block, "        ")),
    `      </Coordinates>`,
    `    </Piece>`,
    `  </RectilinearGrid>`,
  ];

  if (encoding === "ascii") {
    lines.push(`</VTKFile>`, "");
    return Buffer.from(lines.join("\n"), "utf8");
  }

  lines.push(`  <AppendedData encoding="raw">`, "_");
  const head = Buffer.from(lines.join("\n"), "utf8");
  const tail = Buffer.from(`\n  </AppendedData>\n</VTKFile>\n`, "utf8");
  return Buffer.concat([head, encodeAppended(ordered), tail]);
};

/** Creates `outDir` and its parents; a run calls this once before its first step. */
export const ensureOutputDir = async (outDir: string): Promise<void> => {
  await withIoContext("creating directory", outDir, () => fs.mkdir(outDir, { recursive: true }));
};

/** Writes one step into `outDir`, which must already exist (see `ensureOutputDir`). */
export const writeTimestep = async ({
  outDir,
  basename,
  step,
  grid,
  field,
  encoding = "raw",
}: TimestepWriteRequest): Promise<TimestepWriteResult> => {
  const fileName = stepFileName(basename, step);
  const filePath = path.join(outDir, fileName);
  const payload = encodeRectilinearGrid(grid, field, encoding);
  await withIoContext("writing", filePath, () => fs.writeFile(filePath, payload));
  return { fileName, filePath, bytes: payload.length };
};
