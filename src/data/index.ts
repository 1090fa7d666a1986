export {
  ITEM_SPECS,
  ITEM_KINDS,
  exportValue,
  emptyItemCounts,
  type ItemSpec,
} from './items'

export {
  MACHINE_SPECS,
  MACHINE_KINDS,
  getRefund,
  machineAccepts,
  hasOutput,
  hasInput,
  type MachineSpec,
  type RecipeSpec,
} from './machineSpecs'
