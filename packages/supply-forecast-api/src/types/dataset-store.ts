import type {
  DatasetLoadRequest,
  DatasetLoadResponse,
  SnapshotDayRequest,
  SnapshotDayResponse,
} from "@supply-forecast/contracts";
import type { Dataset, ReconciledState } from "../domain/forecast-cycle.js";

export type DatasetStore = {
  loadDataset: (request: DatasetLoadRequest) => DatasetLoadResponse;
  recordSnapshotDay: (date: string, request: SnapshotDayRequest) => SnapshotDayResponse;
  getDataset: () => Dataset;
  getState: () => ReconciledState;
};
