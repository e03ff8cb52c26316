export { parseYamlFile, loadConfig } from "./yamlParser";
export { ZodConfigValidator, formatIssues } from "./ZodConfigValidator";
export * from "./schemas";
