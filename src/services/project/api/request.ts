import type { z } from 'zod';
import {
  RemoteApiError,
  RemoteHttpError,
  remoteErrorDetail,
} from '../../../shared/metadata/errors.js';
import type { HttpMethod, RemoteClient } from '../client.js';
import { EnvelopeSchema } from '../types.js';

/**
 * Execute one call and return its validated `data`.
 *
 * HTTP >= 400 raises RemoteHttpError; a non-zero embedded err_code raises
 * RemoteApiError whatever the HTTP status was.
 */
export async function callApi<T>(
  client: RemoteClient,
  method: HttpMethod,
  path: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const response = await client.request(method, path, body);

  if (response.httpStatus >= 400) {
    throw new RemoteHttpError({ status: response.httpStatus, path, body: response.json });
  }

  const envelope = EnvelopeSchema.safeParse(response.json);
  if (!envelope.success) {
    throw new RemoteApiError({
      path,
      errCode: -1,
      errMsg: 'response is not a JSON object',
      body: response.json,
    });
  }

  const errCode = envelope.data.err_code;
  if (errCode !== undefined && errCode !== 0) {
    throw new RemoteApiError({
      path,
      errCode,
      errMsg: remoteErrorDetail(response.json) ?? 'Unknown error',
      body: response.json,
    });
  }

  const data = schema.safeParse(envelope.data.data);
  if (!data.success) {
    const issue = data.error.issues[0];
    throw new RemoteApiError({
      path,
      errCode: -1,
      errMsg: `unexpected data shape${issue ? ` at ${issue.path.join('.') || '<root>'}: ${issue.message}` : ''}`,
      body: response.json,
    });
  }
  return data.data;
}
