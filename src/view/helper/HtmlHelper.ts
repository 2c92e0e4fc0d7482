import { Helper } from '../Helper';

import type { HelperDelegate, HelperOptions } from 'handlebars';

export class HtmlHelper extends Helper {
  helpers(): Record<string, HelperDelegate> {
    return {
      charset: () => this.safe(`<meta charset="${this.escape(this.view.response?.charset ?? 'UTF-8')}"/>`),
      link: (title: unknown, url: unknown, options?: HelperOptions) =>
        this.safe(`<a href="${this.escape(url)}"${this.attributes(options)}>${this.escape(title)}</a>`),
      tag: (name: unknown, content: unknown, options?: HelperOptions) => {
        const tag = this.escape(name);
        return this.safe(`<${tag}${this.attributes(options)}>${this.escape(content)}</${tag}>`);
      },
    };
  }
}
