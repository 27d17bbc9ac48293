export * from './scope';
export * from './ExpressionResolver';
export * from './command-plan';
export * from './action-walker';
