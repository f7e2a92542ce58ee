export type CpuWorkerData = {
  deadline: number;
  cancel: SharedArrayBuffer;
};

export type CpuWorkerReport = {
  type: 'done';
  iterations: number;
  checksum: number;
};
