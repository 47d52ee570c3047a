/**
 * Terminal integration layer
 */

export * from './color-utils';
export * from './emulator-interface';
export * from './input-decoder';
export * from './key-encoder';
export * from './process-session';
export * from './render-scheduler';
export * from './rendering';
export * from './scroll-state';
export * from './scrollback-store';
export * from './selection-model';
export * from './xterm-emulator';
