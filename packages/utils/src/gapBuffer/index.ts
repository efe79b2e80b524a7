export type { GapBufferOptions, GapBufferSnapshot } from './gapBufferTypes'

export { DEFAULT_GAP_BUFFER_CAPACITY, GapBuffer } from './gapBuffer'
