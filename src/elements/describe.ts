/**
 * Diagnostic renderings of element records and the encoded class flag set.
 *
 * @packageDocumentation
 */

import { SUPER, type FlagSet } from '../flags/index.js';
import { KIND_FLAGS } from '../rules/class-kind.js';
import type { ClassElement, FieldElement, MethodElement } from './types.js';

/**
 * Renders a method as `Owner::name(param0: int) -> void`. Parameters without
 * a declared name render as `param<i>`.
 *
 * @example
 * ```typescript
 * describeMethod(main); // "com.example.App::main(args: java.lang.String[]) -> void"
 * ```
 */
export function describeMethod(
  method: Pick<MethodElement, 'owner' | 'name' | 'type' | 'parameters'>
): string {
  const names = new Map(method.parameters.map((parameter) => [parameter.index, parameter.name]));
  const parameters = method.type.argumentTypes.map(
    (type, i) => `${names.get(i) ?? `param${String(i)}`}: ${type.asString()}`
  );
  return `${method.owner.asString()}::${method.name}(${parameters.join(', ')}) -> ${method.type.returnType.asString()}`;
}

/**
 * Renders a field as `Owner::name: type`.
 */
export function describeField(field: Pick<FieldElement, 'owner' | 'name' | 'type'>): string {
  return `${field.owner.asString()}::${field.name}: ${field.type.asString()}`;
}

/**
 * The access flags the encoder writes for a class: its flags, the kind bit,
 * and `SUPER` when the class treats super calls specially.
 */
export function classAccessFlags(
  element: Pick<ClassElement, 'kind' | 'flags' | 'treatSuperSpecially'>
): FlagSet<'class'> {
  let flags = element.flags;
  const kindFlag = KIND_FLAGS[element.kind];
  if (kindFlag !== undefined) {
    flags = flags.plus(kindFlag);
  }
  return element.treatSuperSpecially ? flags.plus(SUPER) : flags;
}
