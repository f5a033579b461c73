export * from './cases';
export * from './checkers';
export { default as compile } from './compile';
export * from './config';
export * from './error';
export * from './flow';
export * from './report';
export * from './sandbox';
export * from './validate';
export * from './verify';
