export {
  submitUpdate,
  approveUpdate,
  normalizeFields,
  IMMEDIATE_REQUEST_ID,
  type SubmitUpdateInput,
  type SubmitUpdateResult,
  type ApproveUpdateInput,
  type ApproveUpdateResult,
} from './pipeline.js';
