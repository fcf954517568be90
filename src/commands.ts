/**
 * Commands - the closed set of instrumented driver and element operations
 */

export const COMMANDS = [
  // called directly on the driver
  'close',
  'findElementByWebDriver',
  'findElementsByWebDriver',
  'get',
  'getCurrentUrl',
  'getTitle',
  'getWindowHandle',
  'getWindowHandles',
  'quit',
  // driver.navigate()
  'back',
  'forward',
  'refresh',
  'to',
  // driver.switchTo()
  'activeElement',
  'alert',
  'defaultContent',
  'frameByIndex',
  'frameByName',
  'frameByElement',
  'parentFrame',
  'window',
  // driver.manage().window()
  'fullscreen',
  'getPosition',
  'getSize',
  'maximize',
  'setPosition',
  'setSize',
  // called on an element
  'click',
  'clear',
  'findElementByElement',
  'findElementsByElement',
  'getAttribute',
  'getCssValue',
  'getTagName',
  'getText',
  'isDisplayed',
  'isEnabled',
  'isSelected',
  'sendKeys',
  'submit',
  // the current test has failed
  'testFailure',
] as const;

export type Cmd = (typeof COMMANDS)[number];

/**
 * Dotted call path shown in logs. Overloads that only differ in their
 * arguments (the three frame switches) share one name. Commands without
 * an entry render as "unknown".
 */
const DISPLAY_NAMES: Partial<Record<Cmd, string>> = {
  close: 'webDriver.close',
  findElementByWebDriver: 'webDriver.findElement',
  findElementsByWebDriver: 'webDriver.findElements',
  get: 'webDriver.get',
  getCurrentUrl: 'webDriver.getCurrentUrl',
  getTitle: 'webDriver.getTitle',
  getWindowHandle: 'webDriver.getWindowHandle',
  getWindowHandles: 'webDriver.getWindowHandles',
  quit: 'webDriver.quit',
  back: 'webDriver.navigate().back',
  forward: 'webDriver.navigate().forward',
  refresh: 'webDriver.navigate().refresh',
  to: 'webDriver.navigate().to',
  activeElement: 'webDriver.switchTo().activeElement',
  alert: 'webDriver.switchTo().alert',
  defaultContent: 'webDriver.switchTo().defaultContent',
  frameByIndex: 'webDriver.switchTo().frame',
  frameByName: 'webDriver.switchTo().frame',
  frameByElement: 'webDriver.switchTo().frame',
  parentFrame: 'webDriver.switchTo().parentFrame',
  window: 'webDriver.switchTo().window',
  fullscreen: 'webDriver.manage().window().fullscreen',
  getPosition: 'webDriver.manage().window().getPosition',
  getSize: 'webDriver.manage().window().getSize',
  maximize: 'webDriver.manage().window().maximize',
  setPosition: 'webDriver.manage().window().setPosition',
  setSize: 'webDriver.manage().window().setSize',
  click: 'webElement.click',
  clear: 'webElement.clear',
  findElementByElement: 'webElement.findElement',
  findElementsByElement: 'webElement.findElements',
  getAttribute: 'webElement.getAttribute',
  getCssValue: 'webElement.getCssValue',
  getTagName: 'webElement.getTagName',
  getText: 'webElement.getText',
  isDisplayed: 'webElement.isDisplayed',
  isEnabled: 'webElement.isEnabled',
  isSelected: 'webElement.isSelected',
  sendKeys: 'webElement.sendKeys',
  submit: 'webElement.submit',
};

const COMMAND_SET: ReadonlySet<string> = new Set(COMMANDS);

export function isCmd(value: string): value is Cmd {
  return COMMAND_SET.has(value);
}

/**
 * Get the display name of a command
 *
 * @param cmd - Command, or any string read back from an export
 * @returns Dotted call path such as "webElement.click", or "unknown"
 */
export function cmdDisplayName(cmd: string | undefined): string {
  if (cmd === undefined || !isCmd(cmd)) {
    return 'unknown';
  }
  return DISPLAY_NAMES[cmd] ?? 'unknown';
}
