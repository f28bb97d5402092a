/** Public entry point for the workflow engine. */

export * from './models/execution.js';
export * from './models/graph.js';
export * from './models/resource.js';
export * from './items/base.js';
export * from './items/dataConnection.js';
export * from './items/dataStore.js';
export * from './items/registry.js';
export * from './items/tool.js';
export * from './items/view.js';
export * from './services/connectivity.js';
export * from './services/executionDriver.js';
export * from './services/graphml.js';
export * from './services/graphStore.js';
export * from './services/ordering.js';
export * from './services/project.js';
export * from './services/projectScheduler.js';
export * from './services/resourceBroker.js';
export * from './utils/constants.js';
export * from './utils/dag.js';
export * from './utils/errors.js';
export * from './utils/glob.js';
export * from './utils/projectLogger.js';
export * from './utils/projectPersistence.js';
export * from './utils/projectValidator.js';
