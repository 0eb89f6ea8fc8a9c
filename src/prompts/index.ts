export * from './empathetic-review';
