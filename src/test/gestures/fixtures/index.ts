export * from './viewport';
export * from './pages';
