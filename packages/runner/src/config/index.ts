export { getEnv, resetEnv, parseEnv, type Env } from './env.js';
export {
  loadPortalForms,
  PortalFormsSchema,
  DEFAULT_PORTAL_FORMS_PATH,
  type PortalFormsConfig,
  type FormConfig,
  type FormFieldConfig,
  type LoginConfig,
} from './portalForms.js';
