/** Marks an object as the companion of a type of the same name,
 *  e.g. ColumnFormat (the union) and ColumnFormat (its helpers).
 *
 *  Identity at runtime; it only makes companions easy to find.
 * */
export function StaticTypeCompanion<const Companion>(t: Companion): Companion {
  return t
}
