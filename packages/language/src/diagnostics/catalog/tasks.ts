import { defineDiagnostic } from "../types.js";

export const taskDiagnostics = {
  UsingTaskMustHaveAssembly: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "UsingTask without assembly",
    message: "UsingTask must have an AssemblyName or AssemblyFile attribute",
  }),
  TaskFactoryCannotHaveAssemblyName: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Task factory with AssemblyName",
    message: "A UsingTask with a TaskFactory cannot have an AssemblyName attribute",
  }),
  TaskFactoryMustHaveAssemblyFile: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Task factory without AssemblyFile",
    message: "A UsingTask with a TaskFactory must have an AssemblyFile attribute",
  }),
  TaskFactoryMustHaveOneAssemblyOnly: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Both AssemblyName and AssemblyFile",
    message: "A UsingTask cannot have both AssemblyName and AssemblyFile attributes",
  }),
  OneParameterGroup: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Multiple parameter groups",
    message: "A UsingTask can only have one ParameterGroup",
  }),
  OneTaskBody: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Multiple task bodies",
    message: "A UsingTask can only have one Task body",
  }),
  TaskBodyMustHaveFactory: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Task body without factory",
    message: "A Task body is only valid when the UsingTask has a TaskFactory",
  }),
  ParameterGroupMustHaveFactory: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Parameter group without factory",
    message: "A ParameterGroup is only valid when the UsingTask has a TaskFactory",
  }),
  TaskFactoryMustHaveBody: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Task factory without body",
    message: "A UsingTask with a TaskFactory must have a Task body",
  }),
  UnknownTaskFactory: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "warning",
    title: "Unknown task factory",
    message: "Unknown task factory '{0}'",
  }),
  RoslynCodeTaskFactoryRequiresCodeElement: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Missing Code element",
    message: "The RoslynCodeTaskFactory task body must have a Code element",
  }),
  RoslynCodeTaskFactoryWithClassIgnoresParameterGroup: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "warning",
    title: "Parameter group ignored",
    message: "The ParameterGroup is ignored when the task code is a class",
  }),
  InvalidTaskName: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Invalid task name",
    message: "The task name is not valid",
  }),
  FullyQualifiedTaskName: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "warning",
    title: "Task name without namespace",
    message: "The task '{0}' should be declared with a namespace-qualified name",
  }),
  TaskDefinitionNotResolvedFromAssembly: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "warning",
    title: "Task not resolved",
    message: "The task '{0}' could not be resolved from its assembly",
  }),
  TaskNotDefined: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Task not defined",
    message: "The task '{0}' is not defined",
  }),
  TaskDefinedButUnresolved: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "warning",
    title: "Task declared but unresolved",
    message: "The task '{0}' is declared but its assembly could not be resolved",
  }),
  UnknownTaskParameter: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Unknown task parameter",
    message: "The task '{0}' does not have a parameter '{1}'",
  }),
  EmptyRequiredTaskParameter: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Required task parameter is empty",
    message: "The required parameter '{1}' of task '{0}' is empty",
  }),
  MissingRequiredTaskParameter: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Missing required task parameter",
    message: "The task '{0}' is missing the required parameter '{1}'",
  }),
  NonOutputTaskParameter: defineDiagnostic({
    category: "tasks",
    defaultSeverity: "error",
    title: "Not an output parameter",
    message: "The parameter '{1}' of task '{0}' is not an output parameter",
  }),
} as const;
