export * from './deployment.request.dto';
export * from './deployment.response.dto';
