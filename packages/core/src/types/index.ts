export type { KeyReference } from './key-reference.js';
export type { PartialHeaderView, PartialPrefixLength } from './partial-header.js';
