export {
  type TemplateOutputs,
  renderTemplate,
  templateJson,
  writeTemplate,
  buildParameterValues,
} from "./writer.js";
export {
  type ArmTemplate,
  type TemplateParameter,
  type TemplateOutput,
  type ParameterValuesFile,
  DEPLOYMENT_TEMPLATE_SCHEMA,
  DEPLOYMENT_PARAMETERS_SCHEMA,
  CONTENT_VERSION,
} from "./types.js";
