/**
 * One-line, deterministic rendering of a command tree for debugging and
 * for the CLI `--ast` flag.
 *
 *   literal              "text"
 *   sequence             seq(a, b, …)
 *   variant              variant(1-1 ",")[1::a | 2::b]   (+ sampler symbol)
 *   wildcard             wildcard(name)  wildcard(<cmd>, {k=v})
 *   wrap                 wrap(wrapper, inner)
 *   probability          chance(0.5, value)
 *   condition            if(/cat/ => a; key~/re/ => b; else => c)
 *   comment              comment("text")
 *   variable access      $name  $name:default
 *   variable assignment  $name=value  $name?=value  $name=!value
 */

import { samplerSymbol } from "./sampling-method.js";
import { assertNever, type Command } from "./types.js";

export function describeCommand(command: Command): string {
  switch (command.type) {
    case "literal":
      return JSON.stringify(command.text);

    case "sequence":
      return `seq(${command.children.map(describeCommand).join(", ")})`;

    case "variant": {
      const sampler = command.samplingMethod ? samplerSymbol(command.samplingMethod) : "";
      const options = command.options
        .map((option) => `${option.weight}::${describeCommand(option.value)}`)
        .join(" | ");
      return (
        `variant${sampler}(${command.minBound}-${command.maxBound} ` +
        `${JSON.stringify(command.separator)})[${options}]`
      );
    }

    case "wildcard": {
      const sampler = command.samplingMethod ? samplerSymbol(command.samplingMethod) : "";
      const name =
        typeof command.name === "string" ? command.name : describeCommand(command.name);
      const variables = Object.entries(command.variables).map(
        ([key, value]) => `${key}=${describeCommand(value)}`
      );
      const suffix = variables.length > 0 ? `, {${variables.join(", ")}}` : "";
      return `wildcard${sampler}(${name}${suffix})`;
    }

    case "wrap":
      return `wrap(${describeCommand(command.wrapper)}, ${describeCommand(command.inner)})`;

    case "probability":
      return `chance(${command.chance}, ${describeCommand(command.value)})`;

    case "condition": {
      const branches = command.conditions.map((branch) => {
        const key = branch.contextKey !== undefined ? `${branch.contextKey}~` : "";
        return `${key}/${branch.pattern}/ => ${describeCommand(branch.ifValue)}`;
      });
      branches.push(`else => ${describeCommand(command.elseValue)}`);
      return `if(${branches.join("; ")})`;
    }

    case "comment":
      return `comment(${JSON.stringify(command.text)})`;

    case "variable-access":
      return command.defaultValue
        ? `$${command.name}:${describeCommand(command.defaultValue)}`
        : `$${command.name}`;

    case "variable-assignment": {
      const operator = `${command.overwrite ? "" : "?"}=${command.immediate ? "!" : ""}`;
      return `$${command.name}${operator}${describeCommand(command.value)}`;
    }

    default:
      return assertNever(command);
  }
}
