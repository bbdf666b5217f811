export * from './value-objects/ids';

export * from './entities/item-path';
export * from './entities/workspace-info';
export * from './entities/pending-change';
export * from './entities/extended-item';
export * from './entities/server-status';
export * from './entities/get-operation';
export * from './entities/checkin-result';
export * from './entities/undo-result';
