import { Payload } from '../../types/payload';

/**
 * Contract of the template language used for post bodies and layouts
 */
export interface TemplateEngine {
  render(template: string, payload: Payload): Promise<string>;
}
