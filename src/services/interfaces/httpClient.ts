// src/services/interfaces/httpClient.ts

/** Token for the shared axios instance used by the fetch and webhook services. */
export const HTTP_CLIENT = 'HttpClient';
