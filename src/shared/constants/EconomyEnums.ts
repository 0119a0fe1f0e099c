/**
 * Economy enumerations.
 *
 * @module shared/constants/EconomyEnums
 */

/**
 * Direction of a trade between village storage and the outside world.
 */
export enum TradeDirection {
  EXPORT = "export",
  IMPORT = "import",
}
