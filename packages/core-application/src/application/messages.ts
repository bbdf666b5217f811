export const PHASE = {
  loadingPendingChanges: "Loading pending changes",
  uploadingFiles: "Uploading files",
  checkingIn: "Checking in",
  updatingWorkItems: "Updating work items",
  preparingForDownload: "Preparing for download",
  downloading: "Downloading",
  undoingPendingChanges: "Undoing pending changes",
  schedulingForAddition: "Scheduling for addition",
  schedulingForDeletion: "Scheduling for deletion",
} as const;
