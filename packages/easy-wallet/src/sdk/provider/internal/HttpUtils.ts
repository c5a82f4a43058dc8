import type { HttpClientResponse } from "@effect/platform"
import { HttpClient, HttpClientError, HttpClientRequest } from "@effect/platform"
import { Effect, Option, Schema } from "effect"

type Headers = Record<string, string>

/**
 * Pass 2xx responses through; anything else fails with a `StatusCode` ResponseError
 * carrying the response body in its description.
 */
export const filterStatusOk = (
  response: HttpClientResponse.HttpClientResponse
): Effect.Effect<HttpClientResponse.HttpClientResponse, HttpClientError.ResponseError> =>
  response.status >= 200 && response.status < 300
    ? Effect.succeed(response)
    : Effect.flatMap(response.text, (body) =>
        Effect.fail(
          new HttpClientError.ResponseError({
            response,
            request: response.request,
            reason: "StatusCode",
            description: `HTTP ${response.status}: ${body}`
          })
        )
      )

/**
 * True when the failure is an HTTP response with the given status
 */
export const isStatus = (status: number) => (error: unknown): boolean =>
  error instanceof HttpClientError.ResponseError && error.response.status === status

const send = <A, I, R>(request: HttpClientRequest.HttpClientRequest, schema: Schema.Schema<A, I, R>) =>
  HttpClient.execute(request).pipe(
    Effect.flatMap(filterStatusOk),
    Effect.flatMap((response) => response.json),
    Effect.flatMap(Schema.decodeUnknown(schema))
  )

/**
 * GET `url` and decode the JSON body with `schema`
 */
export const get = <A, I, R>(url: string, schema: Schema.Schema<A, I, R>, headers: Headers = {}) =>
  send(HttpClientRequest.get(url).pipe(HttpClientRequest.setHeaders(headers)), schema)

/**
 * {@link get}, with a 404 as `Option.none()`. Blockfrost answers 404 for addresses,
 * transactions and accounts it has never seen.
 */
export const getOptional = <A, I, R>(url: string, schema: Schema.Schema<A, I, R>, headers: Headers = {}) =>
  get(url, schema, headers).pipe(
    Effect.map(Option.some),
    Effect.catchIf(isStatus(404), () => Effect.succeedNone)
  )

/**
 * POST raw CBOR bytes and decode the JSON answer
 */
export const postCbor = <A, I, R>(url: string, body: Uint8Array, schema: Schema.Schema<A, I, R>, headers: Headers = {}) =>
  send(
    HttpClientRequest.post(url).pipe(
      HttpClientRequest.bodyUint8Array(body, "application/cbor"),
      // after the body, which sets its own content-type
      HttpClientRequest.setHeaders(headers)
    ),
    schema
  )
