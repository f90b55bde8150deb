export * from './model/types'
export * from './model/errors'
export * from './model/taper'
export * from './model/stem'
export * from './model/profile'
export * from './model/coefficients'
export * from './renderer/stem'
