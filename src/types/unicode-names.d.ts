// @unicode/unicode-15.1.0 ships no type declarations
declare module '@unicode/unicode-15.1.0/Names/index.js' {
  /** Code point to Unicode character name */
  const names: ReadonlyMap<number, string>;
  export default names;
}
