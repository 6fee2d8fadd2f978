export * from './common-error-response.dto';
export * from './list-limit';
