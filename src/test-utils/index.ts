export * from './test-factories.js'
