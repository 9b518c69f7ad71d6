/**
 * Registry snippets shared by the codegen tests.
 */

export const BASE_REGISTRY = `<?xml version="1.0" encoding="UTF-8"?>
<registry>
  <comment>Test registry</comment>
  <enums name="VkResult" type="enum">
    <enum value="0" name="VK_SUCCESS"/>
    <enum value="1" name="VK_NOT_READY"/>
    <enum value="-1" name="VK_ERROR_OUT_OF_HOST_MEMORY"/>
    <unused start="-12"/>
  </enums>
  <enums name="VkCullModeFlagBits" type="bitmask">
    <enum bitpos="0" name="VK_CULL_MODE_FRONT_BIT"/>
  </enums>
  <enums name="VkStructureType" type="enum">
    <enum value="0" name="VK_STRUCTURE_TYPE_APPLICATION_INFO"/>
  </enums>
  <feature api="vulkan" name="VK_VERSION_1_1" number="1.1">
    <require>
      <type name="VkPhysicalDeviceFeatures2"/>
      <enum extends="VkResult" extnumber="70" offset="0" dir="-" name="VK_ERROR_OUT_OF_POOL_MEMORY"/>
      <enum extends="VkCullModeFlagBits" bitpos="3" name="VK_CULL_MODE_EXTRA_BIT"/>
      <enum name="VK_API_VERSION_1_1" value="1"/>
    </require>
  </feature>
  <extensions>
    <extension name="VK_KHR_surface" number="1" supported="vulkan">
      <require>
        <enum value="25" name="VK_KHR_SURFACE_SPEC_VERSION"/>
        <enum offset="0" extends="VkResult" dir="-" name="VK_ERROR_SURFACE_LOST_KHR"/>
      </require>
    </extension>
    <extension name="VK_KHR_swapchain" number="2" supported="vulkan">
      <require>
        <enum offset="4" extends="VkResult" dir="-" name="VK_ERROR_OUT_OF_DATE_KHR"/>
        <enum offset="0" extends="VkStructureType" name="VK_STRUCTURE_TYPE_SWAPCHAIN_CREATE_INFO_KHR"/>
      </require>
    </extension>
    <extension name="VK_NV_disabled" number="9" supported="disabled">
      <require>
        <enum extends="VkResult" value="0" name="VK_OK"/>
        <enum extends="VkResult" name="VK_BROKEN"/>
      </require>
    </extension>
  </extensions>
</registry>
`;

export const ANDROID_REGISTRY = `<?xml version="1.0" encoding="UTF-8"?>
<registry>
  <extensions>
    <extension name="VK_ANDROID_native_buffer" number="11" supported="vulkan">
      <require>
        <enum offset="0" extends="VkStructureType" name="VK_STRUCTURE_TYPE_NATIVE_BUFFER_ANDROID"/>
        <enum offset="0" extends="VkMissingType" name="VK_MISSING_ANDROID"/>
      </require>
    </extension>
  </extensions>
</registry>
`;
