export { InvalidAmountException } from './invalid-amount.exception';
