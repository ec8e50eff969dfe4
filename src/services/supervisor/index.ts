// Path: src/services/supervisor/index.ts
// Supervision orchestrator public API

export type {
  ClientConfig,
  ProducerArgs,
  ConsumerArgs,
  ReaderArgs,
  RoleArgs,
  RoleSection,
  SharedArgs,
  PlannedConnectionArgs,
  ChildPlan,
  RegistryChildPlan,
  ConnectionChildPlan,
  SupervisionPlan,
  SupervisorState,
  ChildStatus,
  ChildInfo,
  ClientMessage,
  ProcessFactory,
  SupervisorOptions,
  ClientSupervisorEvents,
} from './types.js';

export { DEFAULT_INSTANCE_NAME } from './types.js';

export { planSupervision, mergeArgs, toRoleSection } from './plan.js';
export { ClientSupervisor, startClient } from './supervisor.js';
