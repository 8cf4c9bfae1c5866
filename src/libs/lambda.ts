import middy from '@middy/core';
import httpErrorHandler from '@middy/http-error-handler';
import type { Context } from 'aws-lambda';

export const middyfy = <TEvent, TResult>(handler: (event: TEvent, context: Context) => Promise<TResult>) => {
  return middy<TEvent, TResult>(handler)
    .use(httpErrorHandler());
};
