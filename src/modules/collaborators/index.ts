export type { Clock, FileSource, IdGenerator, RefinementCollaborator, RunPassRequest } from './types.js'
export { ManualClock, SequentialIdGenerator, systemClock, uuidGenerator } from './clock.js'
export { CommandRefiner } from './command-refiner.js'
export type { CommandRefinerOptions } from './command-refiner.js'
export { FsFileSource } from './fs-file-source.js'
