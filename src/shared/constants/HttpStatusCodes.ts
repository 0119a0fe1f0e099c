/**
 * HTTP status code enumerations for API responses.
 *
 * @module shared/constants/HttpStatusCodes
 */

export enum HttpStatusCode {
  OK = 200,

  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  CONFLICT = 409,

  INTERNAL_SERVER_ERROR = 500,
}
