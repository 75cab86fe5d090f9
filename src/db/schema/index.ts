// Schema barrel for the content workflow tables
export * from './enums.js';
export * from './workflows.js';
export * from './content.js';
