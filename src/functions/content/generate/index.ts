export default {
  handler: 'src/functions/content/generate/handler.main',
  timeout: 900,  // sequential Bedrock calls, two per page
  memorySize: 512,
  events: [
    {
      http: {
        method: 'post',
        path: 'generate',
        cors: true
      }
    }
  ]
};
