import axios, { AxiosInstance } from 'axios';

// No timeout: requests wait as long as the transport does
export function createHttpClient(userAgent: string): AxiosInstance {
  return axios.create({
    headers: { 'User-Agent': userAgent },
  });
}
