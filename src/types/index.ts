export type * from './commands'
export type * from './config'
export type * from './notebook'
export type * from './output'
export type * from './pipeline'
export type * from './repository'
