/**
 * Aggregation
 *
 * Aggregate functions and GROUP BY partitioning for SELECT.
 *
 * @module aggregation
 */

export {
  type AggregateFunction,
  type AggregateSpec,
  type AggregateInput,
  type RowGroup,
  isCountAll,
} from './types'

export { computeAggregate, groupRows } from './executor'
