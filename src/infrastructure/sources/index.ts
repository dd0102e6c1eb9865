export * from './subjectChannelSource.js'
export * from './subscribableSource.js'
export * from './emitterSource.js'
