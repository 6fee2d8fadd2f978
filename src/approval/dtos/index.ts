export * from './approval.request.dto';
export * from './approval.response.dto';
