/**
 * Locator normalization
 *
 * Turns the text a driver prints for an element or a locator back into the
 * By.<strategy>("<value>") call that produced it. Best effort: anything
 * that does not look as expected comes back unchanged.
 */

// "[[RemoteWebDriver: firefox on WINDOWS (a66f78e9)] -> xpath: //div[@id='a']]"
const ELEMENT_PATTERN = /^(\[\[.+\] -> )(.+)\]$/;
// "xpath: //div[@id='a']"
const STRATEGY_PATTERN = /^(\S+): (.+)$/;
// "link text: Click Here"
const LINK_TEXT_PATTERN = /^(link text): (.+)$/;
// "By.xpath: //div[@id='a']"
const BY_PATTERN = /^By\.(\S+): (.+)$/;

/**
 * Anything whose string form is a driver's element or locator description
 */
export interface Describable {
  toString(): string;
}

function buildBy(strategy: string, value: string): string {
  return `By.${strategy}("${value}")`;
}

/**
 * Normalize the string form of an element handle
 *
 * @param raw - Driver text such as "[[ChromeDriver: ...] -> id: login]"
 * @returns "By.id(\"login\")", the raw text, or undefined for absent input
 */
export function normalizeElementLocator(raw: string | null | undefined): string | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }

  const outer = ELEMENT_PATTERN.exec(raw);
  if (!outer) {
    return raw;
  }

  const locator = outer[2];
  const generic = STRATEGY_PATTERN.exec(locator);
  if (generic) {
    return buildBy(generic[1], generic[2]);
  }

  const linkText = LINK_TEXT_PATTERN.exec(locator);
  if (linkText) {
    return buildBy('linkText', linkText[2]);
  }

  return locator;
}

/**
 * Normalize the string form of a locator object ("By.id: myId")
 */
export function normalizeByLocator(raw: string | null | undefined): string | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }

  const match = BY_PATTERN.exec(raw);
  if (!match) {
    return raw;
  }
  return buildBy(match[1], match[2]);
}

export function getLocatorFromWebElement(
  elem: Describable | string | null | undefined
): string | undefined {
  if (elem === null || elem === undefined) {
    return undefined;
  }
  return normalizeElementLocator(typeof elem === 'string' ? elem : elem.toString());
}

export function getLocatorFromBy(by: Describable | string | null | undefined): string | undefined {
  if (by === null || by === undefined) {
    return undefined;
  }
  return normalizeByLocator(typeof by === 'string' ? by : by.toString());
}
