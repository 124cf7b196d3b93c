export { LineBasic, DEFAULT_MAX_STEPS } from './line-basic';
export { Logger } from './logger';
export { ExecutionState, ExecutionSnapshot } from './execution-state';
export { ExpressionEvaluator, CONDITION_OPERATORS, ComparisonOperator, compare } from './expression-evaluator';
export { VariableStore, VariableLookup } from './variable-store';
export { OutputBuffer } from './output-buffer';
export { LineDispatcher, INFINITE_LOOP_ERROR, extractStatement } from './line-dispatcher';
export { prefixLabelResolver, exactLabelResolver, stripLabel } from './label-resolver';
export { classifyStatement, StatementContext, StatementHandler } from './statements';
export { formatNumber } from './format';
export * from './types';

// Default export
import { LineBasic } from './line-basic';
export default LineBasic;
