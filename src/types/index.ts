export * from './module';
export * from './kms';
export * from './iam';
