export * from './record';
export * from './drizzle';
