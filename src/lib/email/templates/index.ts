export {
  DEFAULT_SUBJECT_TEMPLATE,
  DEFAULT_BODY_TEMPLATE,
  DEFAULT_ROW_TEMPLATE,
} from './reminder';
export { DEFAULT_TEST_SUBJECT, TEST_MESSAGE_TEMPLATE } from './test-message';
