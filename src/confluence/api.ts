import { HttpClient, type HttpClientConfig } from './httpClient.js';
import { RemoteApiError } from '../core/errors.js';
import type { CreatePageInput, PageAncestorRef, Space, WikiPageApi } from '../models/entities.js';
import { logger } from '../util/logger.js';

export type ConfluenceApiConfig = HttpClientConfig;

export interface PaginatedResponse<T> {
  results: T[];
  start: number;
  limit: number;
  size: number;
  _links?: {
    next?: string;
    base?: string;
    context?: string;
  };
}

interface ContentSummary {
  id: string;
  title: string;
  type: string;
}

interface ContentWithAncestors extends ContentSummary {
  ancestors?: PageAncestorRef[];
}

interface CreatedContentResponse extends ContentSummary {
  space?: { key: string; name?: string };
  _links?: { webui?: string; base?: string };
}

const CONTENT_PATH_PREFIX = '/rest/api/content/';

export class ConfluenceApi implements WikiPageApi {
  private http: HttpClient;

  constructor(private readonly config: ConfluenceApiConfig) {
    this.http = new HttpClient(config);
  }

  /**
   * Get space information by key
   */
  async getSpace(spaceKey: string): Promise<Space> {
    return this.http.get<Space>(`/rest/api/space/${encodeURIComponent(spaceKey)}?expand=homepage`);
  }

  /**
   * Id of the space's home page, the root every imported page hangs from
   */
  async getSpaceHomepageId(spaceKey: string): Promise<string> {
    const space = await this.getSpace(spaceKey);
    const expandable = space._expandable?.homepage;
    const homepageId = space.homepage?.id
      ?? (expandable?.startsWith(CONTENT_PATH_PREFIX) ? expandable.slice(CONTENT_PATH_PREFIX.length) : undefined);

    if (!homepageId) {
      throw new RemoteApiError(`Cannot get the home page id of space ${spaceKey}`, {
        url: `/rest/api/space/${spaceKey}`,
        response: space
      });
    }
    return homepageId;
  }

  /**
   * Ids of the pages with exactly this title in the space
   */
  async findPagesByTitle(title: string, spaceKey: string): Promise<string[]> {
    const response = await this.http.get<PaginatedResponse<ContentSummary>>('/rest/api/content', {
      params: { title, spaceKey, type: 'page' }
    });
    return response.results.map((page) => page.id);
  }

  /**
   * Ancestor ids ordered root first; the last one is the direct parent
   */
  async getAncestors(pageId: string): Promise<string[]> {
    const response = await this.http.get<ContentWithAncestors>(`/rest/api/content/${pageId}`, {
      params: { expand: 'ancestors' }
    });
    return (response.ancestors ?? []).map((ancestor) => ancestor.id);
  }

  async createPage(input: CreatePageInput): Promise<string> {
    const newPage = {
      type: 'page',
      title: input.title,
      space: { key: input.spaceKey },
      body: {
        storage: {
          value: input.body,
          representation: 'storage'
        }
      },
      ancestors: [{ type: 'page', id: input.ancestorId }]
    };

    logger.debug('Creating page', { title: input.title, ancestorId: input.ancestorId, bodyLength: input.body.length });

    const created = await this.http.post<CreatedContentResponse>('/rest/api/content', newPage);

    logger.info('Page created', {
      id: created.id,
      space: created.space?.name ?? input.spaceKey,
      url: created._links?.webui ? `${this.config.baseUrl.replace(/\/$/, '')}${created._links.webui}` : undefined
    });
    return created.id;
  }
}
