export * from './merge-mode.model';
export * from './merge-summary.model';
export * from './table-schema.model';
