// UsingTask declarations and task invocations

import type { XElement } from "../markup/xml-dom.js";
import { parseTaskName } from "../values/clr-names.js";
import type { ResolvedElement } from "../language/document-visitor.js";
import type { ValidationContext } from "./context.js";

export function validateUsingTask(ctx: ValidationContext, { element }: ResolvedElement): void {
  const { diagnostics } = ctx;
  const taskFactory = element.getAttribute("TaskFactory");
  const assemblyName = element.getAttribute("AssemblyName");
  const assemblyFile = element.getAttribute("AssemblyFile");

  if (!assemblyName && !assemblyFile) {
    diagnostics.emit("UsingTaskMustHaveAssembly", { span: element.nameSpan });
  } else if (taskFactory && assemblyName) {
    diagnostics.emit("TaskFactoryCannotHaveAssemblyName", { span: assemblyName.nameSpan });
  } else if (taskFactory && !assemblyFile) {
    diagnostics.emit("TaskFactoryMustHaveAssemblyFile", { span: element.nameSpan });
  } else if (assemblyName && assemblyFile) {
    diagnostics.emit("TaskFactoryMustHaveOneAssemblyOnly", { span: element.nameSpan });
  }

  let parameterGroup: XElement | null = null;
  let taskBody: XElement | null = null;
  for (const child of element.elements()) {
    if (child.nameEquals("ParameterGroup")) {
      if (parameterGroup) {
        diagnostics.emit("OneParameterGroup", { span: child.nameSpan });
      } else {
        parameterGroup = child;
      }
    } else if (child.nameEquals("Task")) {
      if (taskBody) {
        diagnostics.emit("OneTaskBody", { span: child.nameSpan });
      } else {
        taskBody = child;
      }
    }
  }

  const isFactoryBased = taskFactory !== null || parameterGroup !== null || taskBody !== null;
  if (isFactoryBased) {
    if (taskBody && !taskFactory) {
      diagnostics.emit("TaskBodyMustHaveFactory", { span: taskBody.nameSpan });
    }
    if (parameterGroup && !taskFactory) {
      diagnostics.emit("ParameterGroupMustHaveFactory", { span: parameterGroup.nameSpan });
    }
    if (!taskBody && taskFactory) {
      diagnostics.emit("TaskFactoryMustHaveBody", { span: element.nameSpan });
    }

    const factoryName = taskFactory?.value;
    if (taskFactory && factoryName) {
      const lower = factoryName.toLowerCase();
      const isRoslyn =
        lower === "roslyncodetaskfactory" ||
        (lower === "codetaskfactory" && assemblyFile?.value === "$(RoslynCodeTaskFactory)");
      if (isRoslyn) {
        if (taskBody) validateRoslynCodeTask(ctx, taskBody, parameterGroup);
      } else if (lower !== "codetaskfactory") {
        diagnostics.emit("UnknownTaskFactory", {
          span: taskFactory.valueSpan ?? taskFactory.nameSpan,
          args: [factoryName],
        });
      }
    }
  }

  const fullName = element.getAttribute("TaskName")?.value;
  if (fullName === undefined || fullName === null) return;

  const taskName = parseTaskName(fullName);
  if (!taskName) {
    diagnostics.emit("InvalidTaskName", { span: element.nameSpan });
    return;
  }

  if (!isFactoryBased) {
    if (ctx.document.schemas.getTask(taskName.name)?.declarationKind === "assembly-unresolved") {
      diagnostics.emit("TaskDefinitionNotResolvedFromAssembly", { span: element.nameSpan, args: [taskName.name] });
    }
    if (taskName.namespace === null) {
      diagnostics.emit("FullyQualifiedTaskName", { span: element.nameSpan, args: [taskName.name] });
    }
  }
}

function validateRoslynCodeTask(ctx: ValidationContext, taskBody: XElement, parameterGroup: XElement | null): void {
  let code: XElement | null = null;
  for (const child of taskBody.elements()) {
    if (child.nameEquals("Code")) {
      code = child;
      break;
    }
  }
  if (!code) {
    ctx.diagnostics.emit("RoslynCodeTaskFactoryRequiresCodeElement", { span: taskBody.nameSpan });
    return;
  }
  const isClass = code.hasAttribute("Source") || code.getAttribute("Type")?.value?.toLowerCase() === "class";
  if (isClass && parameterGroup) {
    ctx.diagnostics.emit("RoslynCodeTaskFactoryWithClassIgnoresParameterGroup", { span: parameterGroup.nameSpan });
  }
}

/**
 * Checks a task invocation against its declaration: undeclared and unresolved tasks,
 * unknown, missing and empty required parameters, and Output parameter references.
 */
export function validateTaskParameters(ctx: ValidationContext, { element, syntax }: ResolvedElement): void {
  const { diagnostics, document } = ctx;
  const task = document.schemas.getTask(element.name);
  if (!task) return;

  if (task.declarationKind === "inferred") {
    diagnostics.emit("TaskNotDefined", { span: element.nameSpan, args: [element.name] });
    return;
  }
  if (task.declarationKind === "assembly-unresolved") {
    diagnostics.emit("TaskDefinedButUnresolved", { span: element.nameSpan, args: [element.name] });
    return;
  }

  const missing = new Map<string, string>();
  for (const [lower, parameter] of task.parameters) {
    if (parameter.required) missing.set(lower, parameter.name);
  }

  for (const attribute of element.attributes) {
    if (document.syntax.resolveAttribute(attribute, syntax)?.isAbstract !== true) continue;
    const parameter = task.parameters.get(attribute.name.toLowerCase());
    if (!parameter) {
      diagnostics.emit("UnknownTaskParameter", { span: attribute.nameSpan, args: [element.name, attribute.name] });
      continue;
    }
    if (parameter.required) {
      missing.delete(attribute.name.toLowerCase());
      if (!attribute.value || attribute.value.trim().length === 0) {
        diagnostics.emit("EmptyRequiredTaskParameter", { span: attribute.nameSpan, args: [element.name, attribute.name] });
      }
    }
  }

  for (const name of missing.values()) {
    diagnostics.emit("MissingRequiredTaskParameter", { span: element.nameSpan, args: [element.name, name] });
  }

  for (const output of element.elements()) {
    if (!output.nameEquals("Output")) continue;
    const taskParameter = output.getAttribute("TaskParameter");
    const parameterName = taskParameter?.value;
    if (!taskParameter || !parameterName) continue;
    const span = taskParameter.valueSpan ?? taskParameter.nameSpan;
    const parameter = task.parameters.get(parameterName.toLowerCase());
    if (!parameter) {
      diagnostics.emit("UnknownTaskParameter", { span, args: [element.name, parameterName] });
    } else if (!parameter.isOutput) {
      diagnostics.emit("NonOutputTaskParameter", { span, args: [element.name, parameterName] });
    }
  }
}
