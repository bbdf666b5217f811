export interface ProgressSink {
  setPhase(text: string): void;
  setItem(text: string): void;
  setDeterminate(determinate: boolean): void;
  isCanceled(): boolean;
  /** Called once per item a rollback finished with, using the item's final local path. */
  itemCompleted(localPath: string): void;
}

export const NULL_PROGRESS: ProgressSink = {
  setPhase: () => {},
  setItem: () => {},
  setDeterminate: () => {},
  isCanceled: () => false,
  itemCompleted: () => {},
};
