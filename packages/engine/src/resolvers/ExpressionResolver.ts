import { Expression } from '../declarations/Expression';
import { BindingLookup, interpolate, ObjectValue, ReferenceValue, Value } from '../values/Value';

/**
 * Substitutes bound values into an expression tree.
 * The returned value holds no references, so `resolvedValue()` on it cannot fail.
 */
export class ExpressionResolver {
  constructor(private bindings: BindingLookup) {}

  /**
   * @param owner declaration being evaluated, named in type errors
   * @throws UnresolvedReferenceError if a referenced declaration is not bound
   * @throws MissingAttributeError if a referenced attribute path does not exist
   */
  resolve(expression: Expression, owner: string): Value {
    switch (expression.type) {
      case 'Literal': {
        return Value.from(expression.value);
      }
      case 'Reference': {
        return new ReferenceValue(expression.target, expression.path, this.bindings).resolve();
      }
      case 'Template': {
        const fragments = expression.parts.map((part) => (part.type === 'Literal' && typeof part.value === 'string' ? part.value : this.resolve(part, owner)));
        return interpolate(fragments, owner);
      }
      case 'Object': {
        return new ObjectValue(expression.entries.map(([key, entry]): [string, Value] => [key, this.resolve(entry, owner)]));
      }
    }
  }
}
