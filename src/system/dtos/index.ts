export * from './system-info.response.dto';
