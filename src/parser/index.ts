export { parse_document, type ParseResult } from './parse_document';
