/**
 * Injection token for the shared axios instance.
 *
 * @example
 * constructor(@Inject(HTTP_CLIENT) private readonly http: AxiosInstance) {}
 */
export const HTTP_CLIENT = Symbol('HTTP_CLIENT');

export const USER_AGENT = 'miqat-cli';
