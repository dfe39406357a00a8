export * from './enums.types';
export * from './geometry.types';
export * from './hole.types';
export * from './sector.types';
export * from './path.types';
export * from './config.types';
export * from './inspection.types';
