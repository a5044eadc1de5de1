/**
 * HTTP status code enumerations for API responses.
 *
 * @module shared/constants/HttpStatusCodes
 */

/**
 * Enumeration of HTTP status codes returned by the game controllers.
 */
export enum HttpStatusCode {
  ACCEPTED = 202,

  BAD_REQUEST = 400,
  NOT_FOUND = 404,

  INTERNAL_SERVER_ERROR = 500,
}
