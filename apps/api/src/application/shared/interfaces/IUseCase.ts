/**
 * Application use case
 *
 * Controllers call use cases only through `execute`, which resolves to a
 * plain response DTO or rejects with a domain error.
 */
export interface IUseCase<TRequest, TResponse> {
  execute(request: TRequest): Promise<TResponse>;
}
