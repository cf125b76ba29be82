export * from './lib/period-key';
export * from './lib/streak';
export * from './lib/window-summary';
