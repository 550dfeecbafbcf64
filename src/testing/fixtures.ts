import axios, { type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import type { PricePoint } from "../utils/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
export const BASE_TIME = Date.UTC(2024, 0, 1);

/**
 * Daily candles from a list of closes; high/low sit 1% around the close
 */
export function candlesFromCloses(closes: readonly number[], volume: number = 1000): PricePoint[] {
  return closes.map((close, i) => ({
    timestamp: BASE_TIME + i * DAY_MS,
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    volume,
  }));
}

export function constantCandles(count: number, close: number, volume: number = 1000): PricePoint[] {
  return candlesFromCloses(new Array<number>(count).fill(close), volume);
}

export type StubReply = { status: number; data?: unknown } | Error;

export interface StubHttp {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

/**
 * Axios instance whose adapter answers in process
 */
export function createStubHttp(handler: (request: InternalAxiosRequestConfig) => StubReply): StubHttp {
  const requests: InternalAxiosRequestConfig[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push(config);
      const reply = handler(config);
      if (reply instanceof Error) {
        throw reply;
      }
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      return response;
    },
  });

  return { http, requests };
}
