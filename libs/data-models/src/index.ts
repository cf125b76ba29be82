export * from './lib/habit';
