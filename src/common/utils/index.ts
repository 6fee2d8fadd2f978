export * from './date.util';
