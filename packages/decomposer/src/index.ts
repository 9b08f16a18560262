export * from './multi-action';
export * from './parameter-extractor';
export * from './patterns';
export * from './decomposer';
export * from './llm-oracle';
