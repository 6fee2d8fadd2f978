export * from './notification.request.dto';
export * from './notification.response.dto';
