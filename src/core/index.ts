// Core protocol modules
export * from './types'
export * from './message-id'
export * from './fixed-point'
export * from './checksum'
export * from './codec'
export * from './frame'
export * from './data-tags'
export * from './payload'
export * from './format'
export * from './stream-buffer'
export * from './framer'
export * from './parser'
export * from './message-registry'
export * from './message-serializer'
