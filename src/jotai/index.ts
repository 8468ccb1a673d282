export * from './yJotai'
export * from './sessionAtoms'
