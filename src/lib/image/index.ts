export * from './png.js';
export * from './palette.js';
export * from './gif.js';
