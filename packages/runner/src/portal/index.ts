export * from './types.js';
export * from './workflows/index.js';
export { FormWorkflow, formatValue, type FormTimeouts, type FormWorkflowOptions } from './FormWorkflow.js';
export { RoutedPortalCollaborator, type PortalWorkflows } from './RoutedPortalCollaborator.js';
export { createFormWorkflows, type FormWorkflowsOptions } from './createFormWorkflows.js';
export { playwrightFormPage } from './playwrightFormPage.js';
