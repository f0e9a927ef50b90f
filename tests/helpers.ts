import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import jsQR from "jsqr";
import { PNG } from "pngjs";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "qr-badge-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function readPng(png: Buffer): { width: number; height: number; data: Buffer } {
  const image = PNG.sync.read(png);
  return { width: image.width, height: image.height, data: image.data };
}

export function decodeQrPng(png: Buffer): string | null {
  const image = readPng(png);
  const result = jsQR(new Uint8ClampedArray(image.data), image.width, image.height);
  return result ? result.data : null;
}

export function pixelAt(png: Buffer, x: number, y: number): [number, number, number, number] {
  const image = readPng(png);
  const offset = (y * image.width + x) * 4;
  return [image.data[offset], image.data[offset + 1], image.data[offset + 2], image.data[offset + 3]];
}

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}
