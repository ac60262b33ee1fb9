import { createNavigationHistory } from '../renderer/fileView/navigationHistory';

describe('createNavigationHistory', () => {
  it('moves back and forward between visits', () => {
    const history = createNavigationHistory();
    history.push('/a');
    history.push('/b');
    history.push('/c');

    expect(history.back()).toBe('/b');
    expect(history.back()).toBe('/a');
    expect(history.back()).toBeNull();
    expect(history.canGoBack()).toBe(false);
    expect(history.forward()).toBe('/b');
    expect(history.current()).toBe('/b');
    expect(history.canGoForward()).toBe(true);
  });

  it('drops forward entries on a new visit', () => {
    const history = createNavigationHistory();
    history.push('/a');
    history.push('/b');
    history.back();
    history.push('/c');

    expect(history.entries()).toEqual({ paths: ['/a', '/c'], cursor: 1 });
    expect(history.forward()).toBeNull();
  });

  it('ignores a repeat of the current location', () => {
    const history = createNavigationHistory();
    history.push('/a');
    history.push('/a');

    expect(history.entries()).toEqual({ paths: ['/a'], cursor: 0 });
  });

  it('keeps only the most recent visits', () => {
    const history = createNavigationHistory(2);
    history.push('/a');
    history.push('/b');
    history.push('/c');

    expect(history.entries()).toEqual({ paths: ['/b', '/c'], cursor: 1 });
  });

  it('starts empty', () => {
    const history = createNavigationHistory();

    expect(history.current()).toBeNull();
    expect(history.back()).toBeNull();
    expect(history.forward()).toBeNull();
  });
});
