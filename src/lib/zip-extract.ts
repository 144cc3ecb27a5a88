/**
 * ZIP archive helpers using JSZip.
 * Lets the host load a program straight from a downloaded archive.
 */

import JSZip from "jszip";

export interface ZipFileEntry {
  name: string;
  path: string;
  sizeBytes: number;
}

/** File extensions recognised as CHIP-8 programs, in order of preference. */
export const PROGRAM_EXTENSIONS = [".ch8", ".c8", ".hex", ".txt"];

/** Check if data looks like a ZIP file (PK magic bytes). */
export function isZipData(data: Uint8Array): boolean {
  return data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b;
}

/** List the files (not directories) in an archive, sorted by path. */
export async function listZipFiles(data: Uint8Array): Promise<ZipFileEntry[]> {
  const zip = await JSZip.loadAsync(data);
  const entries: ZipFileEntry[] = [];

  for (const file of Object.values(zip.files)) {
    if (file.dir) continue;
    const content = await file.async("uint8array");
    entries.push({
      name: file.name.split("/").pop() ?? file.name,
      path: file.name,
      sizeBytes: content.length,
    });
  }

  return entries.sort((a, b) => a.path.localeCompare(b.path));
}

/** Extract a single file from an archive by path. */
export async function extractZipFile(data: Uint8Array, filePath: string): Promise<Uint8Array> {
  const zip = await JSZip.loadAsync(data);
  const file = zip.file(filePath);
  if (!file) {
    throw new Error(`File not found in archive: ${filePath}`);
  }
  return file.async("uint8array");
}

/**
 * Pick the program to run from an archive: the first file (by path) with
 * the most preferred extension in PROGRAM_EXTENSIONS.
 * Returns null if the archive holds no recognisable program.
 */
export async function findProgramInZip(
  data: Uint8Array
): Promise<{ path: string; data: Uint8Array } | null> {
  const entries = await listZipFiles(data);
  for (const ext of PROGRAM_EXTENSIONS) {
    const match = entries.find((e) => e.name.toLowerCase().endsWith(ext));
    if (match) {
      return { path: match.path, data: await extractZipFile(data, match.path) };
    }
  }
  return null;
}
