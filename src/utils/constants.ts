// Embedding defaults
export const DEFAULT_BIT_DEPTH = 8;
export const MIN_BIT_DEPTH = 1;
export const MAX_BIT_DEPTH = 16;
export const DEFAULT_HEADER_FRAMES = 1;
export const MAX_HEADER_BITS = 48; // keeps the header length a safe integer

// Sample bit masks
export const LSB_MASK = 0x01;
export const LSB_CLEAR_MASK = 0xfe;

// Messages are single-byte (latin1) text
export const MAX_SINGLE_BYTE_CHAR_CODE = 255;

// Frame store defaults
export const DEFAULT_FRAME_RATE = 25;

// YUV4MPEG2 container
export const Y4M_SIGNATURE = 'YUV4MPEG2';
export const Y4M_FRAME_MARKER = 'FRAME';
export const Y4M_EXTENSION = '.y4m';
export const NEWLINE_BYTE = 0x0a;
export const Y4M_LINE_CHUNK_SIZE = 4096;
export const Y4M_MAX_LINE_LENGTH = 1 << 20;
export const COPY_CHUNK_SIZE = 1 << 20; // bytes per read when copying untouched frames
