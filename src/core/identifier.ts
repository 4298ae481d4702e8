/**
 * Short name of a function identifier: everything after the last colon.
 *
 *   arn:aws:lambda:eu-west-1:123456789012:function:orders → orders
 *   123456789012:function:orders                           → orders
 *   orders                                                 → orders
 *
 * The identifier's structure is not validated.
 */
export function shortName(identifier: string): string {
  return identifier.slice(identifier.lastIndexOf(":") + 1);
}
