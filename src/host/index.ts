export * from './operations';
export * from './registry-host';
