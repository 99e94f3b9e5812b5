import type { ImageFormat } from './types.js';
import { decodeGif, GIF_HEADER_SIZE, isGifHeader } from './gif-decoder.js';
import { encodeGif } from './gif-encoder.js';

export const gifFormat: ImageFormat = {
  name: 'gif',
  mimeType: 'image/gif',
  extensions: ['gif'],
  decoder: {
    headerSize: GIF_HEADER_SIZE,
    isSupportedFileFormat: isGifHeader,
    decode: decodeGif
  },
  encoder: {
    encode: (image) => encodeGif(image)
  }
};
