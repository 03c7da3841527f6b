export * from './lzss';
export * from './compressed-archive';
