export * from './definition'
export * from './trigger'
export * from './artifacts'
export * from './runner'
