import { injectable } from 'inversify';
import { IRandomSource } from '../../domain/services/IRandomSource';

@injectable()
export class MathRandomSource implements IRandomSource {
  next(): number {
    return Math.random();
  }
}
