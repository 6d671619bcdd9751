export * from './errors/index.js';
export * from './logger.js';
export * from './config.js';
export * from './store/types.js';
export * from './store/memory-store.js';
export * from './tree/types.js';
export * from './tree/classifier.js';
export * from './tree/kids.js';
export * from './tree/resolver.js';
export * from './fields/field.js';
export * from './fields/widget.js';
export * from './fields/factory.js';
export * from './form.js';
export * from './parsing/form-document.js';
