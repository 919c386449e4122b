export { loadKioskConfig, type KioskConfig } from "../shared/config/kiosk";
export * from "../shared/errors";
export type * from "../shared/types/attendance";
export type * from "../shared/types/connectivity";
export type * from "../shared/types/detection";
export { parseDetectionFrame } from "../shared/validation/detectionFrame";
export { FaceTrackMachine } from "../recognition/tracking/track-state-machine";
export { FaceTracker, type FrameResult } from "../recognition/tracking/face-tracker";
export { PersonCooldownRegistry } from "../recognition/tracking/person-cooldown";
export {
  createWindowResolver,
  parseWindowRules,
} from "../recognition/windows/attendance-window";
export { AttendanceEventStore } from "./database/attendanceEventRepository";
export { openDatabase } from "./database/client";
export { ConnectivityMonitor } from "./connectivity/connectivityMonitor";
export { BackendClient, type AttendanceBackend } from "./sync/backendClient";
export { SyncManager } from "./sync/syncManager";
export { PipelineCoordinator } from "./pipeline/pipelineCoordinator";
export { createKioskRuntime, type KioskRuntime } from "./runtime";
