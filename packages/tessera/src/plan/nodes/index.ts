export * from './plan-node-type.js';
export * from './plan-node.js';
export * from './scan-nodes.js';
export * from './relational-nodes.js';
export * from './ordering-nodes.js';
export * from './aggregate-nodes.js';
export * from './join-nodes.js';
export * from './window-node.js';
export * from './exchange-nodes.js';
export * from './output-nodes.js';
