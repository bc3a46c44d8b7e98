import fs from "fs";
import path from "path";
import { OUTPUT_DIR } from "../constants";
import type { RasterImage } from "./rasterize";

/** Where a script's image goes: <dir>/<name>.png. */
export function outputPath(name: string, dir = OUTPUT_DIR): string {
  return path.join(dir, `${name}.png`);
}

/** Writes the PNG, creating parent directories as needed. */
export async function savePng(image: RasterImage, file: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, image.png);
}
