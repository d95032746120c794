// src/io/unzip.ts
import JSZip from "jszip";

/** Archive bytes; a Node Buffer is a Uint8Array. */
export type ZipInput = Blob | ArrayBuffer | Uint8Array;

export interface ZipEntry {
  /** Forward slash path inside the archive, without a leading "./" or "/" */
  name: string;
  text: () => Promise<string>;
}

/**
 * List the files of a zipped Gerber set. Directory entries are skipped and
 * contents are decoded lazily.
 */
export async function unzipGerbersZip(input: ZipInput): Promise<ZipEntry[]> {
  const zip = await JSZip.loadAsync(input instanceof Blob ? await input.arrayBuffer() : input);

  return Object.values(zip.files)
    .filter((file) => !file.dir)
    .map((file) => ({
      name: file.name.replace(/\\/g, "/").replace(/^\.?\//, ""),
      text: () => file.async("text"),
    }));
}
