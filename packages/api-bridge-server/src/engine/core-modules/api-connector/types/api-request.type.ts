import { type Headers } from 'undici';

export type ApiRequest = {
  method: string;
  url: string;
  headers: Headers;
  body?: string | URLSearchParams;
};
