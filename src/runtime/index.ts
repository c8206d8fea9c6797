export { MountPoint, mountPoint, param } from './declarations';
export { FileInput, FileOutput, LocalFile } from './artifacts';
export type { ArtifactHandle, WritableArtifact } from './artifacts';
export { StepInput, StepOutput, SlotAccessError, stringifyParameter } from './accessors';
export type { ParameterValue, StepInputInit, StepOutputInit } from './accessors';
export { iterate, parseCsvRecords, parseJsonRecords } from './iterate';
export type { CollectionItem } from './iterate';
