export * from './features/explorer'
