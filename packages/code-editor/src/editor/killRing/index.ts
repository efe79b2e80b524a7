export { KillRing } from './killRing'
export type { KillRingOptions } from './killRing'
