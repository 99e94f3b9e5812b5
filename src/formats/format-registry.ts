import { ArgumentError } from '../errors.js';
import type { ImageFormat } from './types.js';
import { bmpFormat } from './bmp-format.js';
import { gifFormat } from './gif-format.js';
import { jpegFormat } from './jpeg-format.js';
import { pngFormat } from './png-format.js';

/**
 * Ordered set of formats. Detection returns the first format whose decoder
 * accepts the header, so registration order breaks ties.
 */
export class FormatRegistry {
  private formats: ImageFormat[] = [];

  constructor(formats: readonly ImageFormat[] = []) {
    for (const format of formats) {
      this.register(format);
    }
  }

  register(format: ImageFormat): void {
    if (this.get(format.name)) {
      throw new ArgumentError(`Format already registered: ${format.name}`);
    }
    this.formats.push(format);
  }

  unregister(name: string): boolean {
    const key = name.toLowerCase();
    const before = this.formats.length;
    this.formats = this.formats.filter((format) => format.name.toLowerCase() !== key);
    return this.formats.length !== before;
  }

  get(name: string): ImageFormat | undefined {
    const key = name.toLowerCase();
    return this.formats.find((format) => format.name.toLowerCase() === key);
  }

  findByExtension(extension: string): ImageFormat | undefined {
    const key = extension.replace(/^\./, '').toLowerCase();
    return this.formats.find((format) => format.extensions.includes(key));
  }

  list(): readonly ImageFormat[] {
    return [...this.formats];
  }

  names(): string[] {
    return this.formats.map((format) => format.name);
  }

  /** Bytes needed to run every decoder's header check */
  get headerSize(): number {
    return this.formats.reduce((max, format) => Math.max(max, format.decoder.headerSize), 0);
  }

  detect(header: Uint8Array): ImageFormat | null {
    for (const format of this.formats) {
      if (header.length >= format.decoder.headerSize && format.decoder.isSupportedFileFormat(header)) {
        return format;
      }
    }
    return null;
  }
}

/**
 * Registry holding every built-in format
 */
export function createDefaultRegistry(): FormatRegistry {
  return new FormatRegistry([bmpFormat, jpegFormat, pngFormat, gifFormat]);
}

let defaultRegistry: FormatRegistry | null = null;

export function getDefaultRegistry(): FormatRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createDefaultRegistry();
  }
  return defaultRegistry;
}

export function setDefaultRegistry(registry: FormatRegistry): void {
  defaultRegistry = registry;
}

export function resetDefaultRegistry(): void {
  defaultRegistry = null;
}
