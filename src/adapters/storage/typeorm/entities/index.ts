export { MessageEntity } from './message.entity';
