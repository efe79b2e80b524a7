export * from './lineStarts'
export * from './movement'
export * from './position'
