export {
  transferService,
  TransferService,
  TransferRequest,
  IssuanceRequest,
  TransferResult,
  isValidAmount,
} from './transfer.service';
export { transferController, TransferController } from './transfer.controller';
export {
  TransferStatus,
  isValidTransition,
  validateTransition,
  isTerminalState,
  getAllowedTransitions,
} from './transfer.state';
export {
  transferSimulation,
  FailureStage,
  SimulatedFailureError,
  FailureSimulationConfig,
} from './transfer.simulation';
export { default as transferRoutes } from './transfer.routes';
