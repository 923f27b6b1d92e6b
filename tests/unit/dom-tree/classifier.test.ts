/**
 * Unit tests for the element classifier
 */

import { describe, it, expect } from 'vitest';
import { createTestEngine } from '../../helpers/test-utils.js';
import { createFakeDocument, el, FakeElement } from '../../mocks/fake-dom.mock.js';

const VIEWPORT = { width: 1280, height: 800 };

describe('createClassifier', () => {
  describe('isClickable', () => {
    it.each(['a', 'button', 'input', 'select', 'textarea'])('should accept <%s>', (tag) => {
      const element = el(tag);
      const { classifier } = createTestEngine(createFakeDocument([element]));
      expect(classifier.isClickable(element)).toBe(true);
    });

    it.each(['onclick', 'ng-click', '@click', 'v-on:click'])(
      'should accept elements with a %s attribute',
      (attribute) => {
        const element = el('div', { attrs: { [attribute]: 'go()' } });
        const { classifier } = createTestEngine(createFakeDocument([element]));
        expect(classifier.isClickable(element)).toBe(true);
      },
    );

    it('should accept interactive roles and reject others', () => {
      const tab = el('div', { attrs: { role: 'tab' } });
      const checkboxItem = el('li', { attrs: { role: 'menuitemcheckbox' } });
      const heading = el('div', { attrs: { role: 'heading' } });
      const { classifier } = createTestEngine(createFakeDocument([tab, checkboxItem, heading]));

      expect(classifier.isClickable(tab)).toBe(true);
      expect(classifier.isClickable(checkboxItem)).toBe(true);
      expect(classifier.isClickable(heading)).toBe(false);
    });

    it('should accept elements with a pointer cursor', () => {
      const element = el('span', { style: { cursor: 'pointer' } });
      const { classifier } = createTestEngine(createFakeDocument([element]));
      expect(classifier.isClickable(element)).toBe(true);
    });

    it('should match class keywords as case-insensitive substrings', () => {
      const primary = el('div', { attrs: { class: 'card Primary-BTN large' } });
      const navLink = el('div', { attrs: { class: 'navlinks' } });
      const plain = el('div', { attrs: { class: 'card large' } });
      const { classifier } = createTestEngine(createFakeDocument([primary, navLink, plain]));

      expect(classifier.isClickable(primary)).toBe(true);
      expect(classifier.isClickable(navLink)).toBe(true);
      expect(classifier.isClickable(plain)).toBe(false);
    });

    it('should reject plain containers', () => {
      const element = el('div', { attrs: { id: 'content' } });
      const { classifier } = createTestEngine(createFakeDocument([element]));
      expect(classifier.isClickable(element)).toBe(false);
    });

    it('should return false and log when attributes cannot be read', () => {
      const element = el('div');
      element.failures.add('attributes');
      const { classifier, log } = createTestEngine(createFakeDocument([element]));

      expect(classifier.isClickable(element)).toBe(false);
      expect(log).toHaveBeenCalledWith(
        'error',
        'Error in isClickable: attributes read failed for <div>',
      );
    });
  });

  describe('isVisible', () => {
    it('should accept a laid-out element under body', () => {
      const element = el('p', { rect: { left: 10, top: 10, width: 200, height: 40 } });
      const { classifier } = createTestEngine(createFakeDocument([element]));
      expect(classifier.isVisible(element, VIEWPORT)).toBe(true);
    });

    it('should reject zero-sized boxes', () => {
      const flat = el('p', { rect: { width: 200, height: 0 } });
      const thin = el('p', { rect: { width: 0, height: 40 } });
      const { classifier } = createTestEngine(createFakeDocument([flat, thin]));

      expect(classifier.isVisible(flat, VIEWPORT)).toBe(false);
      expect(classifier.isVisible(thin, VIEWPORT)).toBe(false);
    });

    it.each([
      { display: 'none' },
      { visibility: 'hidden' },
      { visibility: 'collapse' },
      { opacity: '0' },
    ])('should reject elements styled %o', (style) => {
      const element = el('p', { style });
      const { classifier } = createTestEngine(createFakeDocument([element]));
      expect(classifier.isVisible(element, VIEWPORT)).toBe(false);
    });

    it('should reject elements not attached under body', () => {
      const detached = new FakeElement('button');
      const { classifier } = createTestEngine(createFakeDocument());
      expect(classifier.isVisible(detached, VIEWPORT)).toBe(false);
    });

    it('should reject elements inside a hidden ancestor', () => {
      const inNone = el('button');
      const inHidden = el('button');
      const inTransparent = el('button');
      const { classifier } = createTestEngine(
        createFakeDocument([
          el('div', { style: { display: 'none' } }, el('section', {}, inNone)),
          el('div', { style: { visibility: 'hidden' } }, inHidden),
          el('div', { style: { opacity: '0' } }, inTransparent),
        ]),
      );

      expect(classifier.isVisible(inNone, VIEWPORT)).toBe(false);
      expect(classifier.isVisible(inHidden, VIEWPORT)).toBe(false);
      expect(classifier.isVisible(inTransparent, VIEWPORT)).toBe(false);
    });

    it('should not look at body or above when checking ancestors', () => {
      const element = el('button');
      const doc = createFakeDocument([element]);
      doc.body.style = { opacity: '0' };
      const { classifier } = createTestEngine(doc);

      expect(classifier.isVisible(element, VIEWPORT)).toBe(true);
    });

    it('should tolerate elements far below the fold up to the off-screen margin', () => {
      const reachable = el('a', { rect: { top: 800 + 9999, height: 20 } });
      const beyond = el('a', { rect: { top: 800 + 10001, height: 20 } });
      const farLeft = el('a', { rect: { left: -10200, width: 100 } });
      const { classifier } = createTestEngine(createFakeDocument([reachable, beyond, farLeft]));

      expect(classifier.isVisible(reachable, VIEWPORT)).toBe(true);
      expect(classifier.isVisible(beyond, VIEWPORT)).toBe(false);
      expect(classifier.isVisible(farLeft, VIEWPORT)).toBe(false);
    });

    it('should return false and log when geometry cannot be read', () => {
      const element = el('p');
      element.failures.add('rect');
      const { classifier, log } = createTestEngine(createFakeDocument([element]));

      expect(classifier.isVisible(element, VIEWPORT)).toBe(false);
      expect(log).toHaveBeenCalledWith('error', 'Error in isVisible: rect read failed for <p>');
    });
  });

  describe('isInViewport', () => {
    it('should accept boxes overlapping the viewport', () => {
      const element = el('a', { rect: { left: 100, top: 700, width: 50, height: 200 } });
      const { classifier } = createTestEngine(createFakeDocument([element]));
      expect(classifier.isInViewport(element, VIEWPORT)).toBe(true);
    });

    it('should count boxes within the edge margin', () => {
      const justRight = el('a', { rect: { left: 1281, top: 10, width: 50, height: 20 } });
      const pastRight = el('a', { rect: { left: 1282, top: 10, width: 50, height: 20 } });
      const justAbove = el('a', { rect: { left: 10, top: -21, width: 50, height: 20 } });
      const pastAbove = el('a', { rect: { left: 10, top: -22, width: 50, height: 20 } });
      const { classifier } = createTestEngine(
        createFakeDocument([justRight, pastRight, justAbove, pastAbove]),
      );

      expect(classifier.isInViewport(justRight, VIEWPORT)).toBe(true);
      expect(classifier.isInViewport(pastRight, VIEWPORT)).toBe(false);
      expect(classifier.isInViewport(justAbove, VIEWPORT)).toBe(true);
      expect(classifier.isInViewport(pastAbove, VIEWPORT)).toBe(false);
    });

    it('should reject boxes below the fold', () => {
      const element = el('a', { rect: { left: 10, top: 1500, width: 50, height: 20 } });
      const { classifier } = createTestEngine(createFakeDocument([element]));
      expect(classifier.isInViewport(element, VIEWPORT)).toBe(false);
    });

    it('should require at least a 1x1 box', () => {
      const element = el('a', { rect: { left: 10, top: 10, width: 0.5, height: 20 } });
      const { classifier } = createTestEngine(createFakeDocument([element]));
      expect(classifier.isInViewport(element, VIEWPORT)).toBe(false);
    });

    it('should reject boxes positioned absurdly far from the origin', () => {
      const tall = el('div', { rect: { left: 0, top: -5000, width: 100, height: 20000 } });
      const stray = el('div', { rect: { left: 0, top: -10001, width: 100, height: 20000 } });
      const { classifier } = createTestEngine(createFakeDocument([tall, stray]));

      expect(classifier.isInViewport(tall, VIEWPORT)).toBe(true);
      expect(classifier.isInViewport(stray, VIEWPORT)).toBe(false);
    });

    it('should return false and log when geometry cannot be read', () => {
      const element = el('a');
      element.failures.add('rect');
      const { classifier, log } = createTestEngine(createFakeDocument([element]));

      expect(classifier.isInViewport(element, VIEWPORT)).toBe(false);
      expect(log).toHaveBeenCalledWith('error', 'Error in isInViewport: rect read failed for <a>');
    });
  });
});
