export * from './types';
export * from './numbers';
export * from './lists';
export * from './transform';
export * from './styles';
export * from './markup';
export * from './objects';
export * from './shapes';
export * from './text';
export * from './container';
export * from './document';
