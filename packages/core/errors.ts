import type { Optional } from "./type/utils.js"

/**
 * Try to extract the message field of the error
 *
 * @param error The error object to extract from
 * @returns The error message if it exists or undefined
 */
export function getErrorMessage(error: unknown): Optional<string> {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message
  }

  return
}
