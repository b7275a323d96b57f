import type {
  AnalysisJobDto,
  HealthDto,
  HistoryListDto,
  SubmitAnalysisRequest,
  SubmitAnalysisResponse,
} from '@repo-digest/shared';

export const DEFAULT_API_URL = 'http://localhost:3000/api';
export const OWNER_HEADER = 'x-owner-id';

let apiUrl = DEFAULT_API_URL;
let ownerIdentity: string | null = null;

export function setApiUrl(url: string): void {
  apiUrl = url.replace(/\/+$/, '');
}

export function getApiUrl(): string {
  return apiUrl;
}

export function setOwnerIdentity(owner: string | null | undefined): void {
  ownerIdentity = owner?.trim() || null;
}

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function readErrorMessage(body: unknown, fallback: string): string {
  if (typeof body !== 'object' || body === null) {
    return fallback;
  }
  const message: unknown = Reflect.get(body, 'message');
  if (typeof message === 'string' && message !== '') {
    return message;
  }
  if (Array.isArray(message) && message.length > 0) {
    return message.map(String).join('; ');
  }
  return fallback;
}

async function request<T>(path: string, options?: RequestInit): Promise<T> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (ownerIdentity) {
    headers[OWNER_HEADER] = ownerIdentity;
  }

  const response = await fetch(`${apiUrl}${path}`, { ...options, headers });

  if (!response.ok) {
    const errorData: unknown = await response.json().catch(() => null);
    throw new ApiError(response.status, readErrorMessage(errorData, `HTTP ${response.status}`));
  }

  return response.json() as Promise<T>;
}

// Analyses API
export async function submitAnalysis(body: SubmitAnalysisRequest): Promise<SubmitAnalysisResponse> {
  return request<SubmitAnalysisResponse>('/analyses', {
    method: 'POST',
    body: JSON.stringify(body),
  });
}

export async function getAnalysis(id: string): Promise<AnalysisJobDto> {
  return request<AnalysisJobDto>(`/analyses/${encodeURIComponent(id)}`);
}

// History API
export async function listHistory(): Promise<HistoryListDto> {
  return request<HistoryListDto>('/history');
}

export async function getHealth(): Promise<HealthDto> {
  return request<HealthDto>('/health');
}
