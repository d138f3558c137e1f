import { request, type Dispatcher } from 'undici';
import { z } from 'zod';

export interface TopicName {
   tenant: string;
   namespace: string;
   topic: string;
}

export interface PulsarAdminConfig {
   /** Web-service base URL, e.g. "http://localhost:8080" */
   baseUrl: string;
   authToken?: string;
   timeoutMs: number;
}

const partitionedMetadata = z.object({ partitions: z.number().int().nonnegative() });

/**
 * Non-2xx answer from the admin API.
 */
export class PulsarAdminError extends Error {
   constructor(
      readonly statusCode: number,
      readonly path: string,
      body: string,
   ) {
      super(`Pulsar admin ${path} answered HTTP ${statusCode}${body ? `: ${body}` : ''}`);
      this.name = 'PulsarAdminError';
   }
}

export const topicPath = ({ tenant, namespace, topic }: TopicName) =>
   `persistent/${encodeURIComponent(tenant)}/${encodeURIComponent(namespace)}/${encodeURIComponent(topic)}`;

/**
 * The few admin REST calls queue declaration needs.
 */
export class PulsarAdmin {
   constructor(private readonly config: PulsarAdminConfig) {}

   /** 0 for non-partitioned and for missing topics */
   async partitions(topic: TopicName): Promise<number> {
      const body = await this.call('GET', `${topicPath(topic)}/partitions`);
      return partitionedMetadata.parse(JSON.parse(body)).partitions;
   }

   /**
    * @throws PulsarAdminError 409 when the topic already exists
    */
   async createPartitionedTopic(topic: TopicName, partitions: number): Promise<void> {
      await this.call('PUT', `${topicPath(topic)}/partitions`, JSON.stringify(partitions));
   }

   /** Creates a non-partitioned topic; an existing one is fine. */
   async createTopic(topic: TopicName): Promise<void> {
      await this.call('PUT', topicPath(topic), undefined, [409]);
   }

   /** Creates a durable subscription; an existing one is fine. */
   async createSubscription(topic: TopicName, subscription: string): Promise<void> {
      await this.call(
         'PUT',
         `${topicPath(topic)}/subscription/${encodeURIComponent(subscription)}`,
         undefined,
         [409],
      );
   }

   private async call(
      method: Dispatcher.HttpMethod,
      path: string,
      body?: string,
      tolerated: number[] = [],
   ): Promise<string> {
      const headers: Record<string, string> = { Accept: 'application/json' };
      if (body !== undefined) headers['Content-Type'] = 'application/json';
      if (this.config.authToken) headers['Authorization'] = `Bearer ${this.config.authToken}`;

      const response = await request(`${this.config.baseUrl}/admin/v2/${path}`, {
         method,
         headers,
         body,
         headersTimeout: this.config.timeoutMs,
         bodyTimeout: this.config.timeoutMs,
      });
      const text = await response.body.text();
      const { statusCode } = response;
      if ((statusCode >= 200 && statusCode < 300) || tolerated.includes(statusCode)) return text;
      throw new PulsarAdminError(statusCode, path, text);
   }
}
