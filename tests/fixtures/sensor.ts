/**
 * Shared C fixtures: a sensor module calling into a utility module, and a
 * Unity test for it that passes every check
 */

export const SENSOR_SOURCE = [
  '#include "sensor.h"',
  "",
  "float read_temperature(void)",
  "{",
  "    return convert(adc_read(0));",
  "}",
  "",
].join("\n");

export const UTIL_SOURCE = ["float convert(int raw)", "{", "    return raw * 0.125f;", "}", ""].join("\n");

export const GOOD_TEST_LINES: readonly string[] = [
  "/* test_sensor.c - generated tests */",
  '#include "unity.h"',
  '#include "sensor.h"',
  "#include <stdint.h>",
  "",
  "static float stub_convert_value;",
  "static int stub_convert_calls;",
  "",
  "float convert(int raw)",
  "{",
  "    stub_convert_calls++;",
  "    return stub_convert_value;",
  "}",
  "",
  "void setUp(void)",
  "{",
  "    stub_convert_value = 0.0f;",
  "    stub_convert_calls = 0;",
  "}",
  "",
  "void tearDown(void)",
  "{",
  "    stub_convert_value = 0.0f;",
  "    stub_convert_calls = 0;",
  "}",
  "",
  "void test_read_temperature_typical(void)",
  "{",
  "    stub_convert_value = 25.0f;",
  "    TEST_ASSERT_FLOAT_WITHIN(0.01f, 25.0f, read_temperature());",
  "}",
  "",
  "void test_read_temperature_max(void)",
  "{",
  "    stub_convert_value = 125.0f;",
  "    TEST_ASSERT_FLOAT_WITHIN(0.01f, 125.0f, read_temperature());",
  "}",
  "",
  "int main(void)",
  "{",
  "    UNITY_BEGIN();",
  "    RUN_TEST(test_read_temperature_typical);",
  "    RUN_TEST(test_read_temperature_max);",
  "    return UNITY_END();",
  "}",
  "",
];

export const GOOD_TEST = GOOD_TEST_LINES.join("\n");

/** The passing test without its framework include; validates as low */
export const TEST_WITHOUT_UNITY = GOOD_TEST.replace('#include "unity.h"\n', "");
