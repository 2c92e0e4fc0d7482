import { Helper } from '../Helper';

import type { HelperDelegate, HelperOptions } from 'handlebars';

export class FormHelper extends Helper {
  helpers(): Record<string, HelperDelegate> {
    return {
      formCreate: (options?: HelperOptions) => {
        const hash: Record<string, unknown> = options?.hash ?? {};
        const action = hash.url ?? this.view.request?.getRequestTarget() ?? '/';
        const method = typeof hash.method === 'string' ? hash.method : 'post';

        return this.safe(`<form method="${this.escape(method)}" action="${this.escape(action)}"${this.attributes(options, ['url', 'method'])}>`);
      },
      formEnd: () => this.safe('</form>'),
      control: (field: unknown, options?: HelperOptions) => {
        const hash: Record<string, unknown> = options?.hash ?? {};
        const type = typeof hash.type === 'string' ? hash.type : 'text';
        const name = this.escape(field);

        return this.safe(`<input type="${this.escape(type)}" name="${name}" id="${name}"${this.attributes(options, ['type'])}/>`);
      },
    };
  }
}
