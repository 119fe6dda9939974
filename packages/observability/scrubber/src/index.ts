export * from './lib/scrubber';
