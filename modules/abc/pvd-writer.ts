import fs from "node:fs/promises";
import path from "node:path";
import { withIoContext } from "./errors";

export interface SeriesEntry {
  fileName: string;
  time: number;
}

export const seriesIndexName = (basename: string) => `${basename}_series.pvd`;

const escapeXmlAttr = (value: string) =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

export const formatTimestep = (time: number) => time.toFixed(6);

export const renderSeriesIndex = (entries: readonly SeriesEntry[]): string => {
  const lines = [
    `<?xml version="1.0"?>`,
    `<VTKFile type="Collection" version="0.1" byte_order="LittleEndian">`,
    `  <Collection>`,
    ...entries.map(
      ({ fileName, time }) =>
        `    <DataSet timestep="${formatTimestep(time)}" group="" part="0" file="${escapeXmlAttr(fileName)}"/>`,
    ),
    `  </Collection>`,
    `</VTKFile>`,
  ];
  return `${lines.join("\n")}\n`;
};

export const writeSeriesIndex = async (
  outDir: string,
  basename: string,
  entries: readonly SeriesEntry[],
): Promise<string> => {
  const indexPath = path.join(outDir, seriesIndexName(basename));
  await withIoContext("writing", indexPath, () =>
    fs.writeFile(indexPath, renderSeriesIndex(entries), "utf8"),
  );
  return indexPath;
};
