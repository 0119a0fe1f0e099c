/**
 * Status values reported in village API response bodies.
 *
 * @module shared/constants/ResponseEnums
 */

export enum ResponseStatus {
  /** Health check */
  OK = "ok",
  /** A tick request advanced the simulation */
  SUCCESS = "success",
}
