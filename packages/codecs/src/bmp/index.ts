export * from './types'
export { encodeBmp, encodeBmpWith, srgbToLinear } from './encoder'
