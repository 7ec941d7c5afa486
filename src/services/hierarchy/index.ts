export {
  PolicyDecision,
  authorizeTransfer,
  authorizeIssuance,
  canViewAccount,
  overrideNote,
} from './hierarchy.policy';
