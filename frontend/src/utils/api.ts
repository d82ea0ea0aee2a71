import { z } from 'zod';
import { apiUrl } from '../config/api';

export interface ApiResponse<T> {
  data?: T;
  error?: string;
  status: number;
}

const errorBody = z.object({ error: z.string().optional(), detail: z.string().optional() }).passthrough();

export async function apiCall<T>(
  endpoint: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  method: 'GET' | 'POST' | 'PUT' | 'DELETE' = 'GET',
  body?: unknown
): Promise<ApiResponse<T>> {
  try {
    const url = apiUrl(endpoint);
    const config: RequestInit = {
      method,
      headers: {
        'Content-Type': 'application/json',
      },
    };

    if (body !== undefined && method !== 'GET') {
      config.body = JSON.stringify(body);
    }

    const response = await fetch(url, config);
    const data: unknown = await response.json();

    if (!response.ok) {
      const parsedError = errorBody.safeParse(data);
      const message = parsedError.success ? parsedError.data.error || parsedError.data.detail : undefined;
      return {
        error: message || `HTTP ${response.status}`,
        status: response.status,
      };
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      return {
        error: `Unexpected response from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        status: response.status,
      };
    }

    return {
      data: parsed.data,
      status: response.status,
    };
  } catch (error) {
    return {
      error: error instanceof Error ? error.message : 'Network error',
      status: 0,
    };
  }
}

const generatedFile = z.object({ name: z.string(), content: z.string() });

const createProjectResponse = z.object({ project_id: z.string().min(1) });

const projectResponse = z.object({
  id: z.string().optional(),
  prompt: z.string().default(''),
  status: z.string().optional(),
  files: z.array(generatedFile).default([]),
});

export interface CreateProjectRequest {
  prompt: string;
  model: string;
  temperature: number;
}

export type ProjectDetails = z.infer<typeof projectResponse>;
export type ProjectFile = z.infer<typeof generatedFile>;

export interface ProjectApi {
  createProject(request: CreateProjectRequest): Promise<ApiResponse<{ projectId: string }>>;
  getProject(projectId: string): Promise<ApiResponse<ProjectDetails>>;
  getProjectFile(projectId: string, filePath: string): Promise<ApiResponse<ProjectFile>>;
}

const encodeFilePath = (filePath: string) => filePath.split('/').map(encodeURIComponent).join('/');

export const projectApi: ProjectApi = {
  async createProject(request) {
    const res = await apiCall('/api/projects', createProjectResponse, 'POST', request);
    return res.data ? { data: { projectId: res.data.project_id }, status: res.status } : { error: res.error, status: res.status };
  },

  getProject(projectId) {
    return apiCall(`/api/projects/${encodeURIComponent(projectId)}`, projectResponse);
  },

  getProjectFile(projectId, filePath) {
    return apiCall(`/api/projects/${encodeURIComponent(projectId)}/files/${encodeFilePath(filePath)}`, generatedFile);
  },
};
