export * from './EvolveError'
