export * from './product-response.dto';
