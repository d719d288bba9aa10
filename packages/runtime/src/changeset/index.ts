// Changesets

export {
  change,
  putChange,
  putChanges,
  validateChanges,
  validateChange,
  addError,
  applyChanges,
  applyChangesOrThrow,
  getField,
  getChange,
  isChanged,
  changedFields,
  type Changeset,
  type ApplyResult,
} from './changeset.js';
