export * from './record.model';
export * from './field-descriptor.model';
export * from './store-result.model';
export * from './export.model';
export * from './user.model';
export * from './navigation.model';
export * from './task-config.model';
